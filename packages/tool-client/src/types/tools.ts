import { z } from 'zod';

export const CapabilitySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()),
});

export const ResourceSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export type Capability = z.infer<typeof CapabilitySchema>;
export type Resource = z.infer<typeof ResourceSchema>;

/** A capability tagged with the server that offers it. */
export interface ServerCapability extends Capability {
  serverName: string;
}

export interface ToolContent {
  type: string;
  [key: string]: unknown;
}

export interface ToolCallResult {
  content: ToolContent[];
  structuredContent?: Record<string, unknown>;
  isError: boolean;
}

export interface ServerNotification {
  method: string;
  params?: Record<string, unknown>;
}

export interface ServerInfo {
  name: string;
  version: string;
  protocolVersion: string;
  instructions?: string;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}
