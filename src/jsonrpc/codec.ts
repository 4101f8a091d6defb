import { MessageParseError } from '../shared/errors.js';
import type {
  JsonRpcErrorObject,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcParams,
} from './types.js';

/**
 * Serialize an envelope to its JSON-RPC 2.0 wire form.
 * Key order is fixed: jsonrpc, id, then method/params, result or error.
 */
export function serializeMessage(message: JsonRpcMessage): string {
  switch (message.kind) {
    case 'request':
      return JSON.stringify({
        jsonrpc: '2.0',
        id: message.id,
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      });
    case 'notification':
      return JSON.stringify({
        jsonrpc: '2.0',
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      });
    case 'response':
      return JSON.stringify({ jsonrpc: '2.0', id: message.id, result: message.result });
    case 'error':
      return JSON.stringify({ jsonrpc: '2.0', id: message.id, error: message.error });
  }
}

/** Parse one JSON-RPC 2.0 envelope. Throws MessageParseError on anything malformed. */
export function parseMessage(raw: string): JsonRpcMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new MessageParseError('Invalid JSON in message', raw);
  }
  return decodeEnvelope(value, raw);
}

function decodeEnvelope(value: unknown, raw: string): JsonRpcMessage {
  if (!isRecord(value)) {
    throw new MessageParseError('JSON-RPC message must be an object', raw);
  }

  if (value.jsonrpc !== '2.0') {
    throw new MessageParseError('Missing or unsupported jsonrpc version', raw);
  }

  const hasResult = 'result' in value;
  const hasError = 'error' in value;

  if (hasResult && hasError) {
    throw new MessageParseError('Envelope carries both result and error', raw);
  }

  if ('method' in value) {
    const method = value.method;
    if (typeof method !== 'string') {
      throw new MessageParseError('method must be a string', raw);
    }
    if (hasResult || hasError) {
      throw new MessageParseError('Request carries result or error', raw);
    }

    const params = decodeParams(value.params, raw);

    if (!('id' in value)) {
      return { kind: 'notification', method, ...params };
    }
    const id = value.id;
    if (!isId(id)) {
      throw new MessageParseError('Request id must be a string or number', raw);
    }
    return { kind: 'request', id, method, ...params };
  }

  if (hasResult) {
    const id = value.id;
    if (!isId(id)) {
      throw new MessageParseError('Response id must be a string or number', raw);
    }
    return { kind: 'response', id, result: value.result };
  }

  if (hasError) {
    const id = value.id === null ? null : isId(value.id) ? value.id : undefined;
    if (id === undefined) {
      throw new MessageParseError('Error response id must be a string, number or null', raw);
    }
    return { kind: 'error', id, error: decodeErrorObject(value.error, raw) };
  }

  throw new MessageParseError('Envelope has no method, result or error', raw);
}

function decodeParams(params: unknown, raw: string): { params?: JsonRpcParams } {
  if (params === undefined) return {};
  if (Array.isArray(params)) return { params };
  if (isRecord(params)) return { params };
  throw new MessageParseError('params must be an object or array', raw);
}

function decodeErrorObject(error: unknown, raw: string): JsonRpcErrorObject {
  if (!isRecord(error) || typeof error.code !== 'number' || typeof error.message !== 'string') {
    throw new MessageParseError('error must carry a numeric code and a string message', raw);
  }
  return {
    code: error.code,
    message: error.message,
    ...('data' in error ? { data: error.data } : {}),
  };
}

function isId(id: unknown): id is JsonRpcId {
  return typeof id === 'string' || typeof id === 'number';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
