// Client facade
export { ToolClient, ToolClientOptionsSchema, DEFAULT_CLIENT_VERSION } from './client/tool-client';
export type { ToolClientOptions, ToolClientEvents, DiscoverOptions, ServerSource } from './client/tool-client';
export { BackoffPolicy, BackoffOptionsSchema } from './client/backoff';
export type { BackoffOptions, ResolvedBackoffOptions } from './client/backoff';

// Tasks
export { TaskManager } from './manager/task-manager';
export type { ToolInvoker, TaskManagerOptions, TaskManagerEvents } from './manager/task-manager';

// Configuration
export { loadServerConfig, parseServerConfig } from './manager/config-loader';

// Sessions and wire protocol
export { Session, TOOLS_LIST_CHANGED } from './session/session';
export type { SessionOptions, SessionEvents } from './session/session';
export { PendingRequestTable } from './session/pending-table';
export type { Outcome, AbandonReason, PendingRegistration } from './session/pending-table';
export { ArgumentValidator } from './session/argument-validator';
export type { ValidationResult } from './session/argument-validator';
export { Connector } from './connector/connector';
export type { ClientInfo, ConnectorOptions, ConnectorEvents, HandshakeResult, RequestOptions } from './connector/connector';
export { decodeMessage, encodeRequest, encodeNotification, encodeResult, encodeError, ErrorCode } from './connector/messages';
export type { InboundMessage, DecodeOutcome, RequestId, JsonRpcError } from './connector/messages';

// Transports
export * from './transport';

// Types and errors
export * from './types';
export * from './errors';
