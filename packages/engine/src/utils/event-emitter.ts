/**
 * Minimal typed event emitter. `Events` maps each event name to the tuple of
 * arguments its listeners receive.
 */
export class EventEmitter<Events extends Record<string, unknown[]>> {
  private events: {
    [E in keyof Events]?: Array<(...args: Events[E]) => void>;
  } = {};

  public on<E extends keyof Events>(
    event: E,
    listener: (...args: Events[E]) => void,
  ): this {
    const listeners: Array<(...args: Events[E]) => void> =
      this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  public off<E extends keyof Events>(
    event: E,
    listener: (...args: Events[E]) => void,
  ): this {
    const listeners = this.events[event];
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  public once<E extends keyof Events>(
    event: E,
    listener: (...args: Events[E]) => void,
  ): this {
    const onceWrapper = (...args: Events[E]) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<E extends keyof Events>(event: E, ...args: Events[E]): boolean {
    const listeners = this.events[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }

  public listenerCount(event: keyof Events): number {
    return this.events[event]?.length ?? 0;
  }
}
