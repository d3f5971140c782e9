/**
 * @fileoverview Defines standardized error codes and the McpError class used
 * throughout the server. Codes follow the JSON-RPC 2.0 reserved ranges, with
 * implementation-defined codes in the -32000 to -32099 range.
 * @module src/types-global/errors
 */

/**
 * JSON-RPC 2.0 and implementation-defined error codes.
 */
export enum JsonRpcErrorCode {
  // Standard JSON-RPC 2.0 errors
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  // Implementation-defined server errors
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Conflict = -32002,
  RateLimited = -32003,
  Timeout = -32004,
  Forbidden = -32005,
  Unauthorized = -32006,
  ValidationError = -32007,
  ConfigurationError = -32008,
  InitializationFailed = -32009,
  SerializationError = -32070,
  UnknownError = -32099,
}

/**
 * Structured error carrying a {@link JsonRpcErrorCode} and optional data.
 *
 * Every failure surfaced by the STRING bridge is an `McpError`:
 * - `ValidationError` for caller-supplied parameters rejected before any request,
 * - `ServiceUnavailable` / `Timeout` when STRING cannot be reached or answers
 *   with a non-success status,
 * - `SerializationError` when a response body does not match the requested format.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown>;

  constructor(
    code: JsonRpcErrorCode,
    message?: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.name = 'McpError';
    Object.setPrototypeOf(this, McpError.prototype);
  }
}
