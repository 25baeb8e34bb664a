import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { HTTP_VERSION, type HttpResponse } from "./types.js";

/**
 * Serialize a response: status line, the four fixed headers, a blank line,
 * then the body verbatim. Content-Length counts UTF-8 bytes, not characters.
 */
export function formatResponse(
  response: HttpResponse,
  serverName: string,
): Uint8Array {
  const body = fromString(response.body);
  const head = [
    `${HTTP_VERSION} ${response.status} ${response.statusText}`,
    `Server: ${serverName}`,
    `Content-Length: ${body.length}`,
    `Content-Type: ${response.contentType}`,
    "Connection: close",
    "",
    "",
  ].join("\r\n");
  return concat([fromString(head), body]);
}

/**
 * Write a complete response in a single operation. Resolves with the number
 * of bytes written; rejects if the socket refuses the write.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
  serverName: string,
): Promise<number> {
  const bytes = formatResponse(response, serverName);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
  } else {
    socket.send(bytes);
  }
  return bytes.length;
}
