import type { ServerConfig } from "../config/server-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import {
  ConnectionHandler,
  type ConnectionOutcome,
} from "./connection-handler.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  connection: [remote: string];
  handled: [outcome: ConnectionOutcome];
  error: [err: Error];
  close: [];
};

export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private handler: ConnectionHandler;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.handler = new ConnectionHandler({
      config: this.config,
      fileSystem: options.fileSystem,
      logger: this.logger,
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  /**
   * Bind the listener. Resolves with the bound port; rejects if the bind
   * fails. Errors after that point are logged and the listener stays up.
   */
  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    this.logger.info(
      `Starting HTTP server at ${this.config.host}:${this.config.port}`,
    );

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Connection failed:", err);
          return;
        }
        this.dispatch(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("Connection failed:", err.message);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.logger.info(`Listening on ${this.config.host}:${port}`);
        this.logger.info("Waiting for connections...");
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  /**
   * Hand the connection to its own task. Never awaited here, so a slow
   * client cannot hold up the next accept.
   */
  private dispatch(socket: ITcpSocket): void {
    this.activeConnections.add(socket);
    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    const remote = `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`;
    if (!this.config.quiet) {
      this.logger.info(`New connection: ${remote}`);
    }
    this.emit("connection", remote);

    this.handler
      .handle(socket)
      .then((outcome) => {
        this.activeConnections.delete(socket);
        this.emit("handled", outcome);
      })
      .catch((err: unknown) => {
        this.activeConnections.delete(socket);
        this.logger.error(`Unhandled error on connection ${remote}:`, err);
      });
  }
}
