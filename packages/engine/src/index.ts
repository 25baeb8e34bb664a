// Node adapters
export { NodeFileSystem } from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { DEFAULT_ROOT, defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  ReadOnceOptions,
  RequestReadErrorCode,
} from "./http/request-parser.js";
export {
  parseRequestLine,
  RequestReader,
  RequestReadError,
  splitRequestLine,
} from "./http/request-parser.js";
export { formatResponse, sendResponse } from "./http/response-writer.js";
export type { HttpResponse, ParsedRequest, StatusCode } from "./http/types.js";
export { HTTP_VERSION, RESPONSE_BODIES, STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  ConnectionHandlerOptions,
  ConnectionOutcome,
} from "./server/connection-handler.js";
export { ConnectionHandler } from "./server/connection-handler.js";
export {
  classifyBody,
  getContentType,
  HTML_CONTENT_TYPE,
  TEXT_CONTENT_TYPE,
} from "./server/content-type.js";
export type { FileLookup, FileResolverOptions } from "./server/file-resolver.js";
export {
  FileResolver,
  isWithinRoot,
  normalizeRequestPath,
  resolveTarget,
} from "./server/file-resolver.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export type {
  InMemoryConnection,
  InMemorySocketFactoryOptions,
} from "./testing/in-memory-socket-factory.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
