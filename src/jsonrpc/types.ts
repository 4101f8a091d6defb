// ─── JSON-RPC 2.0 ────────────────────────────────────────────────────────────
// In-memory envelopes carry a `kind` tag; the wire form never does.

export type JsonRpcId = string | number;

export type JsonRpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcNotification {
  kind: 'notification';
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcResponse {
  kind: 'response';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  kind: 'error';
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse
  | JsonRpcErrorResponse;

