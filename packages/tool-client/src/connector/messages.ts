import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

const RequestIdSchema = z.union([z.string(), z.number().int()]);
const ParamsSchema = z.record(z.unknown());

const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const RequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema,
  method: z.string(),
  params: ParamsSchema.optional(),
});

const NotificationSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  method: z.string(),
  params: ParamsSchema.optional(),
});

const ResultResponseSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema,
  result: z.unknown(),
});

const ErrorResponseSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema.nullable(),
  error: JsonRpcErrorSchema,
});

export type RequestId = z.infer<typeof RequestIdSchema>;
export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>;

export type InboundMessage =
  | { kind: 'response'; id: RequestId; result: unknown }
  | { kind: 'error'; id: RequestId | null; error: JsonRpcError }
  | { kind: 'notification'; method: string; params?: Record<string, unknown> }
  | { kind: 'request'; id: RequestId; method: string; params?: Record<string, unknown> };

export type DecodeOutcome = { ok: true; message: InboundMessage } | { ok: false; reason: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

/**
 * Decode one inbound frame into the message union.
 * Never throws: anything that is not a well-formed JSON-RPC 2.0 message is
 * reported as `{ ok: false }` with a reason suitable for logging.
 */
export function decodeMessage(frame: string): DecodeOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (!isRecord(raw)) {
    return { ok: false, reason: Array.isArray(raw) ? 'batch messages are not supported' : 'message is not an object' };
  }

  if ('method' in raw) {
    const hasId = raw.id !== undefined && raw.id !== null;
    if (hasId) {
      const parsed = RequestSchema.safeParse(raw);
      return parsed.success
        ? { ok: true, message: { kind: 'request', id: parsed.data.id, method: parsed.data.method, params: parsed.data.params } }
        : { ok: false, reason: `malformed request: ${describeIssues(parsed.error)}` };
    }
    const parsed = NotificationSchema.safeParse(raw);
    return parsed.success
      ? { ok: true, message: { kind: 'notification', method: parsed.data.method, params: parsed.data.params } }
      : { ok: false, reason: `malformed notification: ${describeIssues(parsed.error)}` };
  }

  if ('error' in raw) {
    const parsed = ErrorResponseSchema.safeParse(raw);
    return parsed.success
      ? { ok: true, message: { kind: 'error', id: parsed.data.id, error: parsed.data.error } }
      : { ok: false, reason: `malformed error response: ${describeIssues(parsed.error)}` };
  }

  if ('result' in raw) {
    const parsed = ResultResponseSchema.safeParse(raw);
    return parsed.success
      ? { ok: true, message: { kind: 'response', id: parsed.data.id, result: parsed.data.result } }
      : { ok: false, reason: `malformed response: ${describeIssues(parsed.error)}` };
  }

  return { ok: false, reason: 'message has neither method, result nor error' };
}

export const encodeRequest = (id: RequestId, method: string, params?: Record<string, unknown>): string =>
  JSON.stringify({ jsonrpc: JSONRPC_VERSION, id, method, ...(params !== undefined && { params }) });

export const encodeNotification = (method: string, params?: Record<string, unknown>): string =>
  JSON.stringify({ jsonrpc: JSONRPC_VERSION, method, ...(params !== undefined && { params }) });

export const encodeResult = (id: RequestId, result: Record<string, unknown>): string =>
  JSON.stringify({ jsonrpc: JSONRPC_VERSION, id, result });

export const encodeError = (id: RequestId | null, code: number, message: string, data?: unknown): string =>
  JSON.stringify({ jsonrpc: JSONRPC_VERSION, id, error: { code, message, ...(data !== undefined && { data }) } });
