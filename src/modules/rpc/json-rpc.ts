import { isRecord } from '../../infra/contracts/json';

/** JSON-RPC protocol version carried by every envelope. */
export const JSON_RPC_VERSION = '2.0' as const;

/** Standard JSON-RPC 2.0 error codes. */
export const JsonRpcErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type JsonRpcId = number | string;

/** Structured params: named (object) or positional (array). */
export type JsonRpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/** Control plane → node call expecting a correlated reply. */
export interface JsonRpcRequest {
  jsonrpc: typeof JSON_RPC_VERSION;
  method: string;
  params: JsonRpcParams;
  id: JsonRpcId;
}

/** One-way envelope: no id, no reply. */
export interface JsonRpcNotification {
  jsonrpc: typeof JSON_RPC_VERSION;
  method: string;
  params: JsonRpcParams;
}

export interface JsonRpcSuccess {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId | null;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/** Node-initiated request as received; id is absent for notifications. */
export interface InboundRequest {
  method: string;
  params: unknown;
  id?: JsonRpcId;
}

/**
 * INVALID_REQUEST reply to a request whose id is not a valid JSON-RPC id.
 * The id is echoed back exactly as received.
 */
export interface JsonRpcInvalidRequestReply {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: unknown;
  error: JsonRpcErrorObject;
}

/** Classification of one inbound text frame. */
export type InboundFrame =
  | { kind: 'request'; request: InboundRequest }
  | { kind: 'response'; response: JsonRpcResponse }
  | { kind: 'invalid'; reply: JsonRpcInvalidRequestReply; reason: string }
  | { kind: 'malformed'; reason: string };

export function isJsonRpcFailure(response: JsonRpcResponse): response is JsonRpcFailure {
  return 'error' in response;
}

export function buildRequest(method: string, params: JsonRpcParams, id: JsonRpcId): JsonRpcRequest {
  return { jsonrpc: JSON_RPC_VERSION, method, params, id };
}

export function buildNotification(method: string, params: JsonRpcParams): JsonRpcNotification {
  return { jsonrpc: JSON_RPC_VERSION, method, params };
}

export function buildResult(id: JsonRpcId | null, result: unknown): JsonRpcSuccess {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function buildError(id: JsonRpcId | null, code: number, message: string): JsonRpcFailure {
  return { jsonrpc: JSON_RPC_VERSION, id, error: { code, message } };
}

/** A bad request that carried an id is answered with INVALID_REQUEST; one without is dropped. */
function rejectRequest(hasId: boolean, rawId: unknown, reason: string): InboundFrame {
  if (!hasId) return { kind: 'malformed', reason };
  const reply: JsonRpcInvalidRequestReply = {
    jsonrpc: JSON_RPC_VERSION,
    id: rawId,
    error: { code: JsonRpcErrorCodes.INVALID_REQUEST, message: reason },
  };
  return { kind: 'invalid', reason, reply };
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return typeof value === 'number' || typeof value === 'string';
}

/**
 * Coerce whatever a node put under "error" into a code/message pair.
 * Missing fields become INTERNAL_ERROR / "Unknown error".
 */
function normalizeErrorObject(value: unknown): JsonRpcErrorObject {
  if (isRecord(value)) {
    const normalized: JsonRpcErrorObject = {
      code: typeof value.code === 'number' ? value.code : JsonRpcErrorCodes.INTERNAL_ERROR,
      message: typeof value.message === 'string' ? value.message : 'Unknown error',
    };
    if ('data' in value) normalized.data = value.data;
    return normalized;
  }
  return {
    code: JsonRpcErrorCodes.INTERNAL_ERROR,
    message: typeof value === 'string' ? value : 'Unknown error',
  };
}

/**
 * Parse and classify an inbound text frame.
 * - `method` present: request (id optional, must be number or string when present);
 *   a bad request that carries an id is `invalid`, with an INVALID_REQUEST reply echoing it
 * - `id` with `result` or `error`: response; a non-null `error` wins, and a null
 *   `error` without `result` is still a failure
 * - anything else: malformed
 */
export function parseFrame(raw: string): InboundFrame {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return { kind: 'malformed', reason: 'Invalid JSON' };
  }
  if (!isRecord(msg)) {
    return { kind: 'malformed', reason: 'Envelope is not an object' };
  }

  if ('method' in msg) {
    const { method, id } = msg;
    const hasId = id !== undefined && id !== null;
    if (typeof method !== 'string' || method === '') {
      return rejectRequest(hasId, id, 'method must be a non-empty string');
    }
    const request: InboundRequest = { method, params: msg.params ?? {} };
    if (hasId) {
      if (!isJsonRpcId(id)) {
        return rejectRequest(true, id, 'id must be a number or string');
      }
      request.id = id;
    }
    return { kind: 'request', request };
  }

  if ('id' in msg && ('result' in msg || 'error' in msg)) {
    const id = msg.id;
    if (id !== null && !isJsonRpcId(id)) {
      return { kind: 'malformed', reason: 'id must be a number or string' };
    }
    // A null error only counts as success next to a result.
    const failed = 'error' in msg && ((msg.error !== undefined && msg.error !== null) || !('result' in msg));
    if (failed) {
      return {
        kind: 'response',
        response: { jsonrpc: JSON_RPC_VERSION, id, error: normalizeErrorObject(msg.error) },
      };
    }
    return { kind: 'response', response: buildResult(id, msg.result ?? null) };
  }

  return { kind: 'malformed', reason: 'Neither a request nor a response' };
}

/** Serialize an envelope into one text frame. */
export function encodeFrame(
  envelope: JsonRpcRequest | JsonRpcNotification | JsonRpcResponse | JsonRpcInvalidRequestReply,
): string {
  return JSON.stringify(envelope);
}
