/**
 * Transport port: one GET with a timeout, answered by a status code or a
 * classified failure. Workers never see a thrown transport error.
 */

export type FailureCategory =
  | "timeout"
  | "network"
  | "protocol"
  | "client";

export interface TransportFailure {
  category: FailureCategory;
  code: string;
  message: string;
}

export type GetOutcome =
  | { ok: true; status: number; latencyMs: number }
  | { ok: false; failure: TransportFailure; latencyMs: number };

export interface Transport {
  get(url: string, timeoutMs: number): Promise<GetOutcome>;
  close(): Promise<void>;
}

export interface HttpTransportOptions {
  headers?: Record<string, string>;
  /** Max sockets kept open by this transport's pool. */
  connections?: number;
}

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const PROTOCOL_CODES = new Set([
  "HPE_INVALID_CONSTANT",
  "HPE_INVALID_STATUS",
  "HPE_INVALID_HEADER_TOKEN",
  "UND_ERR_INFO",
  "UND_ERR_RES_CONTENT_LENGTH_MISMATCH",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function errorCause(error: unknown): unknown {
  if (error instanceof Error) return error.cause;
  return undefined;
}

/**
 * Classify an error into a category based on its type, not its message.
 *
 * - DOMException(TimeoutError/AbortError): request timeout
 * - SyntaxError: malformed response
 * - Error with a system or undici code (on the error or its `cause`, which
 *   is where fetch puts it): network or protocol failure
 */
export function classifyError(error: unknown): TransportFailure {
  if (error instanceof DOMException) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return { category: "timeout", code: error.name, message: error.message };
    }
  }

  if (error instanceof SyntaxError) {
    return { category: "protocol", code: "SyntaxError", message: error.message };
  }

  if (error instanceof Error) {
    const code = errorCode(error) ?? errorCode(errorCause(error));
    if (code === "UND_ERR_HEADERS_TIMEOUT" || code === "UND_ERR_BODY_TIMEOUT") {
      return { category: "timeout", code, message: error.message };
    }
    if (code && NETWORK_CODES.has(code)) {
      return { category: "network", code, message: error.message };
    }
    if (code && (PROTOCOL_CODES.has(code) || code.startsWith("HPE_"))) {
      return { category: "protocol", code, message: error.message };
    }
    return { category: "client", code: code ?? error.name, message: error.message };
  }

  return { category: "client", code: "unknown", message: String(error) };
}
