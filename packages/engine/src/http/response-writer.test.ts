import { describe, expect, it, vi } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import { formatResponse, sendResponse } from "./response-writer.js";
import type { HttpResponse } from "./types.js";

const SERVER_NAME = "RustRawHTTP/1.0";

const notes: HttpResponse = {
  status: 200,
  statusText: "OK",
  body: "hello world",
  contentType: "text/plain; charset=utf-8",
};

function socketStub(overrides: Partial<ITcpSocket> = {}): ITcpSocket {
  return {
    send: vi.fn(),
    onData() {},
    onEnd() {},
    onClose() {},
    onError() {},
    close() {},
    destroy() {},
    ...overrides,
  };
}

describe("formatResponse", () => {
  it("writes the status line, fixed headers and body", () => {
    expect(decodeToString(formatResponse(notes, SERVER_NAME))).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "Server: RustRawHTTP/1.0\r\n" +
        "Content-Length: 11\r\n" +
        "Content-Type: text/plain; charset=utf-8\r\n" +
        "Connection: close\r\n" +
        "\r\n" +
        "hello world",
    );
  });

  it("counts bytes, not characters, in Content-Length", () => {
    const text = decodeToString(
      formatResponse({ ...notes, body: "héllo ✓" }, SERVER_NAME),
    );
    expect(text).toContain("\r\nContent-Length: 10\r\n");
    expect(text.endsWith("\r\n\r\nhéllo ✓")).toBe(true);
  });

  it("handles an empty body", () => {
    const text = decodeToString(
      formatResponse({ ...notes, body: "" }, SERVER_NAME),
    );
    expect(text).toContain("\r\nContent-Length: 0\r\n");
    expect(text.endsWith("Connection: close\r\n\r\n")).toBe(true);
  });

  it("uses the given server name", () => {
    const text = decodeToString(formatResponse(notes, "test-server"));
    expect(text.split("\r\n")[1]).toBe("Server: test-server");
  });
});

describe("sendResponse", () => {
  it("writes the whole response in one sendAndWait call", async () => {
    const sendAndWait = vi.fn(async (_data: Uint8Array) => {});
    const socket = socketStub({ sendAndWait });

    const written = await sendResponse(socket, notes, SERVER_NAME);

    expect(sendAndWait).toHaveBeenCalledTimes(1);
    expect(socket.send).not.toHaveBeenCalled();
    expect(written).toBe(formatResponse(notes, SERVER_NAME).length);
    expect(decodeToString(sendAndWait.mock.calls[0][0])).toBe(
      decodeToString(formatResponse(notes, SERVER_NAME)),
    );
  });

  it("falls back to plain send when sendAndWait is unavailable", async () => {
    const sent: Uint8Array[] = [];
    const socket = socketStub({
      send(data: Uint8Array) {
        sent.push(data.slice());
      },
    });

    await sendResponse(socket, notes, SERVER_NAME);

    expect(sent).toHaveLength(1);
    expect(decodeToString(sent[0]).startsWith("HTTP/1.1 200 OK\r\n")).toBe(true);
  });

  it("propagates a failed write", async () => {
    const socket = socketStub({
      sendAndWait: () => Promise.reject(new Error("EPIPE")),
    });

    await expect(sendResponse(socket, notes, SERVER_NAME)).rejects.toThrow(
      "EPIPE",
    );
  });
});
