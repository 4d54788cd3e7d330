import { loadClientConfig } from './config.js';
import { createSession, type Session } from './auth.js';
import type { ApiError, ApiResult } from '../types/api.js';

/**
 * Prints an API error the way the scripts report it: status line first,
 * then the decoded response body when there is one.
 */
export function reportError(context: string, error: ApiError): void {
  process.stderr.write(`${context}: ${error.message}\n`);
  if (error.body !== undefined && error.body !== null) {
    const body = typeof error.body === 'string' ? error.body : JSON.stringify(error.body, null, 2);
    process.stderr.write(`${body}\n`);
  }
}

/**
 * Builds a session from the environment / config file, or exits with a
 * description of the expected variables.
 */
export function sessionFromEnv(): Session {
  try {
    return createSession(loadClientConfig());
  } catch (error) {
    process.stderr.write(
      `Configuration error: ${error instanceof Error ? error.message : String(error)}\n`,
    );
    process.stderr.write('\nRequired environment variables (or cloudiq.config.json keys):\n');
    process.stderr.write('  CLIENT_ID       (clientId)      - API client ID\n');
    process.stderr.write('  CLIENT_SECRET   (clientSecret)  - API client secret\n');
    process.stderr.write('  CLOUDIQ_USER    (username)      - Cloud-IQ admin username\n');
    process.stderr.write('  CLOUDIQ_PW      (password)      - Cloud-IQ admin password\n');
    process.stderr.write('\nOptional:\n');
    process.stderr.write('  CLOUDIQ_CONFIG        - path to a JSON/JSON5 config file\n');
    process.stderr.write('  CLOUDIQ_BASE_URL      - API base URL\n');
    process.stderr.write('  CLOUDIQ_ORG_ID        - default organization ID\n');
    process.stderr.write('  CLOUDIQ_TOKEN_WINDOW  - token refresh window in seconds\n');
    process.exit(1);
  }
}

/** Returns the data of a successful result, or reports the error and exits. */
export function unwrapOrExit<T>(context: string, result: ApiResult<T>): T {
  if (result.ok) return result.data;
  reportError(context, result.error);
  process.exit(1);
}

export function requireOrganizationId(session: Session, flag: string | undefined): number {
  const value = flag !== undefined ? Number(flag) : session.config.organizationId;
  if (value === undefined || !Number.isInteger(value) || value <= 0) {
    process.stderr.write('An organization ID is required: pass --org <id> or set CLOUDIQ_ORG_ID\n');
    process.exit(1);
  }
  return value;
}
