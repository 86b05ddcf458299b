import type {
  JsonRpcErrorResponse,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  Message,
  Part,
  RequestId,
} from '@agent-mesh/core';
import { RpcErrorCode, isRecord } from '@agent-mesh/core';
import { InvalidParamsError, ProtocolError } from './errors.js';

export type DecodeResult =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; response: JsonRpcErrorResponse };

export function successResponse<T>(id: RequestId, result: T): JsonRpcSuccessResponse<T> {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(
  id: RequestId,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

function isRequestId(value: unknown): value is string | number {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Decode an inbound request body. Malformed payloads become a ready-made
 * `-32603` error envelope carrying the request id when it could be read.
 */
export function decodeRequest(raw: string | Buffer): DecodeResult {
  const malformed = (id: RequestId, detail: string): DecodeResult => ({
    ok: false,
    response: errorResponse(id, RpcErrorCode.INTERNAL_ERROR, `Internal error: ${detail}`),
  });

  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof raw === 'string' ? raw : raw.toString('utf-8'));
  } catch {
    return malformed(null, 'request body is not valid JSON');
  }

  if (!isRecord(parsed)) {
    return malformed(null, 'request must be a JSON object');
  }

  const id = isRequestId(parsed['id']) ? parsed['id'] : null;
  if (id === null) {
    return malformed(null, 'request "id" is missing or invalid');
  }
  if (parsed['jsonrpc'] !== '2.0') {
    return malformed(id, 'unsupported "jsonrpc" version');
  }

  const method = parsed['method'];
  if (typeof method !== 'string' || method.length === 0) {
    return malformed(id, 'request "method" is missing');
  }

  const params = parsed['params'] ?? {};
  if (!isRecord(params)) {
    return malformed(id, 'request "params" must be an object');
  }

  return { ok: true, request: { jsonrpc: '2.0', id, method, params } };
}

/**
 * Validate a response envelope received from another agent.
 * Throws `ProtocolError` for anything that is not exactly one of
 * success or error.
 */
export function decodeResponse(raw: string): JsonRpcResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProtocolError('Response body is not valid JSON');
  }

  if (!isRecord(parsed) || parsed['jsonrpc'] !== '2.0') {
    throw new ProtocolError('Response is not a JSON-RPC 2.0 envelope');
  }

  const rawId = parsed['id'];
  const id: RequestId = isRequestId(rawId) ? rawId : null;
  if (rawId !== null && id === null) {
    throw new ProtocolError('Response "id" is invalid');
  }

  const hasResult = 'result' in parsed;
  const rawError = parsed['error'];
  if (hasResult === (rawError !== undefined)) {
    throw new ProtocolError('Response must carry exactly one of "result" or "error"');
  }

  if (hasResult) {
    return successResponse(id, parsed['result']);
  }

  if (!isRecord(rawError) || typeof rawError['code'] !== 'number' || typeof rawError['message'] !== 'string') {
    throw new ProtocolError('Response "error" must have a numeric code and a message');
  }
  return errorResponse(id, rawError['code'], rawError['message'], rawError['data']);
}

export function encodeEnvelope(envelope: JsonRpcRequest | JsonRpcResponse): string {
  return JSON.stringify(envelope);
}

/** One server-sent-event frame carrying a response envelope. */
export function encodeStreamEvent(envelope: JsonRpcResponse): string {
  return `data: ${JSON.stringify(envelope)}\n\n`;
}

/**
 * Incremental decoder for `text/event-stream` bodies. Feed it text chunks
 * as they arrive; it returns the `data` payload of every completed frame.
 */
export class StreamFrameDecoder {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk.replace(/\r\n/g, '\n');
    const payloads: string[] = [];

    let boundary = this.buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const frame = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      const data = frame
        .split('\n')
        .filter((line) => line.startsWith('data:'))
        .map((line) => line.slice(5).replace(/^ /, ''))
        .join('\n');
      if (data.length > 0) payloads.push(data);
      boundary = this.buffer.indexOf('\n\n');
    }

    return payloads;
  }

  /** Text left over after the last complete frame. */
  get pending(): string {
    return this.buffer;
  }
}

/**
 * Validate and normalize the `message` carried in send/stream params.
 * Throws `InvalidParamsError` describing the first problem found.
 */
export function parseMessage(value: unknown): Message {
  if (!isRecord(value)) {
    throw new InvalidParamsError('"message" must be an object');
  }

  const role = value['role'];
  if (role !== 'user' && role !== 'agent') {
    throw new InvalidParamsError('"message.role" must be "user" or "agent"');
  }

  const messageId = value['messageId'];
  if (typeof messageId !== 'string' || messageId.length === 0) {
    throw new InvalidParamsError('"message.messageId" is required');
  }

  const rawParts = value['parts'];
  if (!Array.isArray(rawParts) || rawParts.length === 0) {
    throw new InvalidParamsError('"message.parts" must be a non-empty array');
  }
  const parts = rawParts.map((p: unknown, i) => parsePart(p, i));

  const message: Message = { kind: 'message', role, parts, messageId };

  for (const key of ['taskId', 'contextId'] as const) {
    const v = value[key];
    if (v === undefined) continue;
    if (typeof v !== 'string') {
      throw new InvalidParamsError(`"message.${key}" must be a string`);
    }
    message[key] = v;
  }

  const metadata = value['metadata'];
  if (metadata !== undefined) {
    if (!isRecord(metadata)) throw new InvalidParamsError('"message.metadata" must be an object');
    message.metadata = metadata;
  }

  return message;
}

function parsePart(value: unknown, index: number): Part {
  if (!isRecord(value)) {
    throw new InvalidParamsError(`"message.parts[${index}]" must be an object`);
  }
  const metadata = isRecord(value['metadata']) ? { metadata: value['metadata'] } : {};

  if (value['kind'] === 'text' && typeof value['text'] === 'string') {
    return { kind: 'text', text: value['text'], ...metadata };
  }
  if (value['kind'] === 'data' && isRecord(value['data'])) {
    return { kind: 'data', data: value['data'], ...metadata };
  }
  throw new InvalidParamsError(`"message.parts[${index}]" is not a valid text or data part`);
}
