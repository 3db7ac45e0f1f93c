import { promises as fs } from 'fs';
import { resolve } from 'path';
import { ConfigError, errorMessage } from '../errors';
import { ServerDescriptorSchema, type ServerDescriptor } from '../types/server';
import { deepFreeze, formatIssues } from '../utils';

type RawEntry = Record<string, unknown>;

const isRecord = (value: unknown): value is RawEntry =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const TRANSPORT_ALIASES: Record<string, ServerDescriptor['transport']> = {
  process: 'process',
  stdio: 'process',
  network: 'network',
  websocket: 'network',
  ws: 'network',
};

/**
 * Collect `[name, entry]` pairs from the supported layouts:
 * `{ mcpServers: { name: {...} } }`, `{ servers: { name: {...} } }` and
 * `{ servers: [{ name, ... }] }`.
 */
function collectEntries(raw: unknown, issues: string[]): Array<[string, unknown]> {
  if (!isRecord(raw)) {
    issues.push('configuration must be a JSON object');
    return [];
  }

  const section = raw.mcpServers ?? raw.servers;
  if (section === undefined) {
    issues.push('configuration needs an "mcpServers" or "servers" section');
    return [];
  }

  if (Array.isArray(section)) {
    return section.map((entry, index): [string, unknown] => {
      const name = isRecord(entry) && typeof entry.name === 'string' ? entry.name : `#${index}`;
      return [name, entry];
    });
  }
  if (isRecord(section)) {
    return Object.entries(section);
  }

  issues.push('"mcpServers" must be an object keyed by server name');
  return [];
}

function resolveTransport(entry: RawEntry): unknown {
  const declared = entry.transport ?? entry.type;
  if (typeof declared === 'string') {
    return TRANSPORT_ALIASES[declared.toLowerCase()] ?? declared;
  }
  return entry.url !== undefined ? 'network' : 'process';
}

/**
 * Validate a parsed configuration document into frozen server descriptors.
 * Entries with `"disabled": true` are skipped. Every problem is reported in
 * a single ConfigError.
 */
export function parseServerConfig(raw: unknown): readonly ServerDescriptor[] {
  const issues: string[] = [];
  const descriptors: ServerDescriptor[] = [];
  const names = new Set<string>();

  for (const [name, entry] of collectEntries(raw, issues)) {
    if (!isRecord(entry)) {
      issues.push(`${name}: server entry must be an object`);
      continue;
    }
    if (entry.disabled === true) {
      continue;
    }
    if (names.has(name)) {
      issues.push(`${name}: duplicate server name`);
      continue;
    }
    names.add(name);

    const parsed = ServerDescriptorSchema.safeParse({ ...entry, name, transport: resolveTransport(entry) });
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error).map(issue => `${name}.${issue}`));
      continue;
    }
    descriptors.push(deepFreeze(parsed.data));
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid server configuration', issues);
  }
  return Object.freeze(descriptors);
}

export async function loadServerConfig(path: string): Promise<readonly ServerDescriptor[]> {
  const configPath = resolve(path);

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read server configuration ${configPath}: ${errorMessage(error)}`, [], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Server configuration ${configPath} is not valid JSON: ${errorMessage(error)}`, [], {
      cause: error,
    });
  }

  return parseServerConfig(raw);
}
