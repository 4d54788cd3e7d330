import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import type { Session } from '../auth.js';
import { ping } from '../http.js';
import { authStatusToolDefinition } from './auth-status.js';
import { organizationsToolDefinition } from './organizations.js';
import { productsToolDefinition } from './products.js';
import { tenantsToolDefinition } from './tenants.js';

export const serverInfoToolDefinition = {
  name: 'ciq_server_info',
  description:
    'Describe this server: version, the Cloud-IQ endpoint it talks to and whether that endpoint answers a ping.',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

export const TOOL_DEFINITIONS = [
  authStatusToolDefinition,
  organizationsToolDefinition,
  productsToolDefinition,
  tenantsToolDefinition,
  serverInfoToolDefinition,
];

const packageSchema = z.object({ name: z.string(), version: z.string() });

/** Name and version from the package manifest at the project root. */
function readPackage(): z.infer<typeof packageSchema> {
  const manifest = join(__dirname, '..', '..', '..', 'package.json');
  let raw: string;
  try {
    raw = readFileSync(manifest, 'utf-8');
  } catch {
    return { name: 'cloudiq-client', version: 'unknown' };
  }
  const parsed = packageSchema.safeParse(JSON5.parse(raw));
  return parsed.success ? parsed.data : { name: 'cloudiq-client', version: 'unknown' };
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Pings the configured API (no credentials involved) and reports the
 * connection settings of the session alongside the tool list.
 */
export async function executeServerInfo(session: Session): Promise<string> {
  const pkg = readPackage();
  const { config } = session;

  const pong = await ping(config);
  const reachability = pong.ok
    ? Object.entries(pong.data)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(', ') || 'ok'
    : `unreachable (${pong.error.message})`;

  const token = session.cache.get();

  return [
    `# cloudiq-mcp (${pkg.name} v${pkg.version})`,
    `Runtime: Node ${process.version} on ${process.platform}`,
    '',
    '## Cloud-IQ',
    `Endpoint: ${config.baseUrl}`,
    `Ping: ${reachability}`,
    `API user: ${config.username}`,
    `Default organization: ${config.organizationId ?? 'none'}`,
    `Token refresh window: ${config.expiryWindowSeconds}s`,
    `Cached token: ${token ? `valid until ${new Date(token.expiresAt * 1000).toISOString()}` : 'none'}`,
    '',
    `## Tools (${TOOL_DEFINITIONS.length})`,
    ...TOOL_DEFINITIONS.map((tool) => `- ${tool.name}`),
  ].join('\n');
}
