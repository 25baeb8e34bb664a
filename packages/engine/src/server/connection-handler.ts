import type { ServerConfig } from "../config/server-config.js";
import {
  parseRequestLine,
  RequestReader,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import {
  type HttpResponse,
  RESPONSE_BODIES,
  STATUS_TEXT,
} from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { decodeToString } from "../utils/buffer.js";
import { getContentType } from "./content-type.js";
import { FileResolver } from "./file-resolver.js";

export interface ConnectionHandlerOptions {
  config: ServerConfig;
  fileSystem: IFileSystem;
  logger?: Logger;
}

/** Terminal state of one connection. */
export type ConnectionOutcome =
  | { kind: "read-failed" }
  | { kind: "responded"; status: number; bytesWritten: number }
  | { kind: "write-failed"; status: number };

/**
 * Runs the whole pipeline for one accepted connection: a single read, the
 * request line, routing, the file lookup and exactly one response.
 */
export class ConnectionHandler {
  private config: ServerConfig;
  private logger: Logger;
  private resolver: FileResolver;

  constructor(options: ConnectionHandlerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
    this.resolver = new FileResolver({
      root: this.config.root,
      fs: options.fileSystem,
      confineToRoot: this.config.confineToRoot,
      quiet: this.config.quiet,
      logger: this.logger,
    });
  }

  async handle(socket: ITcpSocket): Promise<ConnectionOutcome> {
    const reader = new RequestReader(socket);

    try {
      let raw: Uint8Array;
      try {
        raw = await reader.readOnce({
          maxBytes: this.config.readBufferSize,
          timeoutMs: this.config.readTimeoutMs,
        });
      } catch (err) {
        this.logger.error(
          "Failed to read from connection:",
          err instanceof Error ? err.message : err,
        );
        return { kind: "read-failed" };
      }

      if (!this.config.quiet) {
        this.logger.info(`Received ${raw.length} bytes`);
      }
      this.logger.debug(`Request:\n${decodeToString(raw)}`);

      const response = await this.route(raw);
      return await this.respond(socket, response);
    } finally {
      socket.close();
    }
  }

  private async route(raw: Uint8Array): Promise<HttpResponse> {
    const request = parseRequestLine(raw);
    if (!request) {
      return plainResponse(400, RESPONSE_BODIES.badRequest);
    }

    if (!this.config.quiet) {
      this.logger.info(`Method: ${request.method}, Path: ${request.path}`);
    }

    if (request.method !== "GET") {
      return plainResponse(405, RESPONSE_BODIES.methodNotAllowed);
    }

    const lookup = await this.resolver.resolve(request.path);
    return {
      status: lookup.status,
      statusText: lookup.statusText,
      body: lookup.body,
      contentType: getContentType(
        lookup.found ? lookup.filePath : undefined,
        lookup.body,
      ),
    };
  }

  private async respond(
    socket: ITcpSocket,
    response: HttpResponse,
  ): Promise<ConnectionOutcome> {
    try {
      const bytesWritten = await withDeadline(
        sendResponse(socket, response, this.config.serverName),
        this.config.writeTimeoutMs,
      );
      if (!this.config.quiet) {
        this.logger.info(
          `${response.status} ${response.statusText} (${bytesWritten} bytes)`,
        );
      }
      return { kind: "responded", status: response.status, bytesWritten };
    } catch (err) {
      this.logger.error(
        "Failed to send response:",
        err instanceof Error ? err.message : err,
      );
      // A graceful close would wait on the unsent bytes.
      socket.destroy();
      return { kind: "write-failed", status: response.status };
    }
  }
}

function plainResponse(status: 400 | 405, body: string): HttpResponse {
  return {
    status,
    statusText: STATUS_TEXT[status],
    body,
    contentType: getContentType(undefined, body),
  };
}

function withDeadline<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Write did not complete within ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
