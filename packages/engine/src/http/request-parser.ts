import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import type { ParsedRequest } from "./types.js";

const LF = 0x0a;
const DEFAULT_MAX_READ_BYTES = 1024;
const DEFAULT_READ_TIMEOUT_MS = 5000;

function isAsciiWhitespace(byte: number): boolean {
  // space, \t, \n, \f, \r
  return (
    byte === 0x20 ||
    byte === 0x09 ||
    byte === 0x0a ||
    byte === 0x0c ||
    byte === 0x0d
  );
}

/**
 * Split the first line of a raw request into whitespace-separated tokens.
 *
 * Works on the bytes directly: the line ends at the first LF (a trailing CR
 * is whitespace and falls away), and only the tokens themselves are decoded,
 * lossily, so arbitrary binary input never throws.
 */
export function splitRequestLine(raw: Uint8Array): string[] {
  const lineEnd = raw.indexOf(LF);
  const line = lineEnd === -1 ? raw : raw.subarray(0, lineEnd);

  const tokens: string[] = [];
  let start = -1;
  for (let i = 0; i <= line.length; i++) {
    const atBoundary = i === line.length || isAsciiWhitespace(line[i]);
    if (atBoundary) {
      if (start !== -1) {
        tokens.push(decodeToString(line.subarray(start, i)));
        start = -1;
      }
    } else if (start === -1) {
      start = i;
    }
  }
  return tokens;
}

/**
 * Interpret the request line as `<method> <path> [version ...]`.
 * Returns null when there are fewer than two tokens.
 */
export function parseRequestLine(raw: Uint8Array): ParsedRequest | null {
  const tokens = splitRequestLine(raw);
  if (tokens.length < 2) {
    return null;
  }

  const [method, path, version] = tokens;
  return version === undefined ? { method, path } : { method, path, version };
}

export type RequestReadErrorCode = "READ_TIMEOUT" | "SOCKET_ERROR";

export class RequestReadError extends Error {
  constructor(
    readonly code: RequestReadErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RequestReadError";
  }
}

export interface ReadOnceOptions {
  maxBytes?: number;
  timeoutMs?: number;
}

/**
 * Takes a single read from a socket: the first chunk the peer sends,
 * truncated to `maxBytes`. Anything after the first chunk is ignored.
 */
export class RequestReader {
  private firstChunk: Uint8Array | null = null;
  private ended = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      if (this.firstChunk !== null) return;
      this.firstChunk = data;
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.notifyWaiters();
    });
  }

  /**
   * Resolves with the bytes read, or an empty array when the peer ended the
   * stream without sending anything.
   */
  async readOnce(options?: ReadOnceOptions): Promise<Uint8Array> {
    const maxBytes = options?.maxBytes ?? DEFAULT_MAX_READ_BYTES;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      if (this.firstChunk !== null) {
        return this.firstChunk.slice(0, maxBytes);
      }

      if (this.socketError) {
        throw new RequestReadError("SOCKET_ERROR", this.socketError.message, {
          cause: this.socketError,
        });
      }

      if (this.ended) {
        return new Uint8Array(0);
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        throw new RequestReadError(
          "READ_TIMEOUT",
          `No data received within ${timeoutMs}ms`,
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
