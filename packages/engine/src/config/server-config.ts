export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Document root. Request paths are appended to it verbatim. */
  root: string;
  /** Value of the Server response header. Default: 'RustRawHTTP/1.0' */
  serverName: string;
  /** Capacity of the single read taken from each connection. Default: 1024 */
  readBufferSize: number;
  /** Max time to wait for the first bytes of a request. Default: 5000ms */
  readTimeoutMs: number;
  /** Max time allowed for writing the response. Default: 5000ms */
  writeTimeoutMs: number;
  /** Treat targets that resolve outside `root` as not found. Default: true */
  confineToRoot: boolean;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
}

export const DEFAULT_ROOT = "public";

export function defaultConfig(root: string = DEFAULT_ROOT): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    root,
    serverName: "RustRawHTTP/1.0",
    readBufferSize: 1024,
    readTimeoutMs: 5000,
    writeTimeoutMs: 5000,
    confineToRoot: true,
    quiet: false,
  };
}
