import { z } from 'zod';

export const TransportKindSchema = z.enum(['process', 'network']);
export type TransportKind = z.infer<typeof TransportKindSchema>;

export const FramingSchema = z.enum(['newline', 'content-length']);
export type Framing = z.infer<typeof FramingSchema>;

const ServerNameSchema = z
  .string()
  .min(1, 'server name must not be empty')
  .regex(/^[A-Za-z0-9._-]+$/, 'server name may only contain letters, digits, ".", "_" and "-"');

export const ProcessServerSchema = z.object({
  name: ServerNameSchema,
  transport: z.literal('process'),
  command: z.string().min(1, 'command must not be empty'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
  framing: FramingSchema.default('newline'),
});

export const NetworkServerSchema = z.object({
  name: ServerNameSchema,
  transport: z.literal('network'),
  url: z
    .string()
    .url()
    .refine(url => /^wss?:\/\//i.test(url), 'url must use the ws:// or wss:// scheme'),
  headers: z.record(z.string()).optional(),
});

export const ServerDescriptorSchema = z.discriminatedUnion('transport', [
  ProcessServerSchema,
  NetworkServerSchema,
]);

export type ProcessServerDescriptor = z.infer<typeof ProcessServerSchema>;
export type NetworkServerDescriptor = z.infer<typeof NetworkServerSchema>;
export type ServerDescriptor = z.infer<typeof ServerDescriptorSchema>;
export type ServerDescriptorInput = z.input<typeof ServerDescriptorSchema>;

export const SessionStateSchema = z.enum(['connecting', 'ready', 'degraded', 'closed']);
export type SessionState = z.infer<typeof SessionStateSchema>;
