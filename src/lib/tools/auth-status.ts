import { getAccessToken, type Session } from '../auth.js';
import { me } from '../resources/users.js';
import type { TokenData } from '../../types/tokens.js';

export const authStatusToolDefinition = {
  name: 'ciq_auth_status',
  description:
    'Check the Cloud-IQ connection: requests a token if needed and shows the signed-in API user.',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

/**
 * Formats a full connected status message with token details.
 */
function formatConnectedStatus(session: Session, token: TokenData, username: string | null): string {
  const lines = ['Status: Connected ✓'];
  if (username) {
    lines.push(`User: ${username}`);
  }
  lines.push(`API: ${session.config.baseUrl}`);
  lines.push(`Token expires: ${new Date(token.expiresAt * 1000).toISOString()}`);
  if (session.config.organizationId !== undefined) {
    lines.push(`Default organization: ${session.config.organizationId}`);
  }
  return lines.join('\n');
}

/**
 * Formats an error status message.
 */
function formatError(message: string): string {
  return [
    'Status: Not connected',
    `Error: ${message}`,
    'Action: Check CLIENT_ID, CLIENT_SECRET, CLOUDIQ_USER and CLOUDIQ_PW.',
  ].join('\n');
}

/**
 * Check the Cloud-IQ connection status. Reuses a cached token when it is
 * still outside the refresh window.
 */
export async function executeAuthStatus(session: Session): Promise<string> {
  const token = await getAccessToken(session);
  if (!token.ok) {
    return formatError(token.error.message);
  }

  const cached = session.cache.get();
  if (!cached) {
    return formatError('Token was not cached after sign-in.');
  }

  const profile = await me(session);
  const username = profile.ok ? (profile.data.UserName ?? null) : null;
  return formatConnectedStatus(session, cached, username);
}
