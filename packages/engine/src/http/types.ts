export interface ParsedRequest {
  method: string;
  path: string;
  /** Third request-line token, when present. Never validated. */
  version?: string;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
  contentType: string;
}

export const HTTP_VERSION = "HTTP/1.1";

export const STATUS_TEXT = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
} as const;

export type StatusCode = keyof typeof STATUS_TEXT;

export const RESPONSE_BODIES = {
  badRequest: "Invalid request format",
  methodNotAllowed: "Only GET method is supported",
  notFound: "The requested file was not found",
} as const;
