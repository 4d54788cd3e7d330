import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import type { ClientConfig } from '../types/tokens.js';

export const DEFAULT_BASE_URL = 'https://api.crayon.com/api/v1';
export const DEFAULT_EXPIRY_WINDOW_SECONDS = 600; // 10 minutes
export const DEFAULT_CONFIG_FILENAME = 'cloudiq.config.json';

const baseUrlSchema = z.string().url();
const expiryWindowSchema = z.number().int().nonnegative();
const organizationIdSchema = z.number().int().positive();

const configFileSchema = z
  .object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    baseUrl: baseUrlSchema,
    expiryWindowSeconds: expiryWindowSchema,
    organizationId: organizationIdSchema,
  })
  .partial();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Reads a JSON (or JSON5) config file. Throws if the file is missing,
 * unparsable or has fields of the wrong type.
 */
export function readConfigFile(filePath: string): ConfigFile {
  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new Error(
      `Invalid config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid config file ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
}

/** Validates an optional env var against the schema its file key uses. */
function parseEnv<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T>,
  expected: string,
): T | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(`${name} must be ${expected}, got "${value}"`);
  }
  return result.data;
}

/**
 * Resolves which config file to read: CLOUDIQ_CONFIG when set, otherwise
 * cloudiq.config.json in the working directory if it exists.
 */
function resolveConfigPath(env: NodeJS.ProcessEnv, cwd: string): string | undefined {
  const explicit = env['CLOUDIQ_CONFIG'];
  if (explicit) return resolve(cwd, explicit);
  const fallback = resolve(cwd, DEFAULT_CONFIG_FILENAME);
  return existsSync(fallback) ? fallback : undefined;
}

/**
 * Loads client configuration from environment variables, falling back to
 * values in the config file. Environment values win.
 * Throws with a clear message if any credential is missing.
 */
export function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ClientConfig {
  const configPath = resolveConfigPath(env, cwd);
  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};

  const clientId = env['CLIENT_ID'] || file.clientId;
  const clientSecret = env['CLIENT_SECRET'] || file.clientSecret;
  const username = env['CLOUDIQ_USER'] || file.username;
  const password = env['CLOUDIQ_PW'] || file.password;

  const missing: string[] = [];
  if (!clientId) missing.push('CLIENT_ID');
  if (!clientSecret) missing.push('CLIENT_SECRET');
  if (!username) missing.push('CLOUDIQ_USER');
  if (!password) missing.push('CLOUDIQ_PW');

  if (!clientId || !clientSecret || !username || !password) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }

  const organizationId =
    parseEnv(
      env,
      'CLOUDIQ_ORG_ID',
      z.coerce.number().pipe(organizationIdSchema),
      'a positive integer',
    ) ?? file.organizationId;
  const baseUrl =
    parseEnv(env, 'CLOUDIQ_BASE_URL', baseUrlSchema, 'an absolute URL') ??
    file.baseUrl ??
    DEFAULT_BASE_URL;
  const expiryWindowSeconds =
    parseEnv(
      env,
      'CLOUDIQ_TOKEN_WINDOW',
      z.coerce.number().pipe(expiryWindowSchema),
      'a non-negative integer',
    ) ??
    file.expiryWindowSeconds ??
    DEFAULT_EXPIRY_WINDOW_SECONDS;

  return {
    clientId,
    clientSecret,
    username,
    password,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    expiryWindowSeconds,
    ...(organizationId !== undefined ? { organizationId } : {}),
  };
}
