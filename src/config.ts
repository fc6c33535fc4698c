import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import dotenv from 'dotenv';

// Keep stdout free of dotenv's banner; JSON output mode is parsed by scripts.
process.env.DOTENV_CONFIG_QUIET = '1';
dotenv.config();

export const CLI_NAME = 'favro';
export const CLI_VERSION = '0.3.0';

const intInRange = (name: string, fallback: string, min: number, max: number) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .refine(
      (val) => !isNaN(val) && val >= min && val <= max,
      `${name} must be between ${min} and ${max}`
    );

// Zod schema for environment variables
const EnvSchema = z.object({
  FAVRO_API_URL: z
    .string()
    .optional()
    .default('https://favro.com/api/v1')
    .pipe(
      z
        .string()
        .url('FAVRO_API_URL must be a valid URL')
        .refine((url) => url.replace(/\/+$/, '').endsWith('/api/v1'), 'FAVRO_API_URL must end with /api/v1')
    )
    .describe('Favro API base URL'),

  FAVRO_EMAIL: z
    .string()
    .email('FAVRO_EMAIL must be an email address')
    .optional()
    .describe('Account email, overrides the stored login'),

  FAVRO_TOKEN: z
    .string()
    .min(8, 'FAVRO_TOKEN appears to be too short (minimum 8 characters)')
    .optional()
    .describe('API token, overrides the stored login'),

  FAVRO_ORGANIZATION_ID: z
    .string()
    .min(1)
    .optional()
    .describe('Organization ID, overrides the stored selection'),

  FAVRO_CONFIG_DIR: z
    .string()
    .optional()
    .default(path.join(os.homedir(), '.config', 'favro-cli'))
    .describe('Directory holding config.json'),

  FAVRO_MAX_CONCURRENT_REQUESTS: intInRange('FAVRO_MAX_CONCURRENT_REQUESTS', '4', 1, 20).describe(
    'Maximum concurrent API requests'
  ),

  FAVRO_REQUEST_TIMEOUT_MS: intInRange('FAVRO_REQUEST_TIMEOUT_MS', '15000', 1, 60000).describe(
    'Request timeout in milliseconds'
  ),

  FAVRO_RESOLVER_CACHE_SIZE: intInRange('FAVRO_RESOLVER_CACHE_SIZE', '500', 100, 100000).describe(
    'Maximum scope keys held by one resolver cache'
  ),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

// Empty strings in .env files mean "unset"
function presentValues(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const values: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    values[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return values;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(presentValues(env));

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `  - ${err.path.join('.')}: ${err.message}`)
    );
  }

  return result.data;
}

function loadConfigOrExit(): EnvConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;

    console.error('❌ Invalid environment configuration:');
    console.error(error.issues.join('\n'));
    console.error('\n💡 Check your .env file or unset the offending variables.');
    process.exit(1);
  }
}

export const config = loadConfigOrExit();

// ============================================
// SECRET REDACTION
// ============================================

const secrets = new Set<string>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function registerSecret(secret: string | undefined): void {
  if (secret && secret.length >= 8) {
    secrets.add(secret);
  }
}

export function clearSecrets(): void {
  secrets.clear();
}

export function redactSecrets(text: string): string {
  if (!text) return text;

  let redacted = text;
  for (const secret of secrets) {
    redacted = redacted.replace(new RegExp(escapeRegExp(secret), 'g'), '***REDACTED_TOKEN***');
  }

  // Authorization header values
  redacted = redacted.replace(/Bearer\s+[\w\-.=]+/gi, 'Bearer ***REDACTED_TOKEN***');
  redacted = redacted.replace(/Basic\s+[A-Za-z0-9+/=]+/g, 'Basic ***REDACTED_TOKEN***');

  return redacted;
}

const redactArgs = (args: unknown[]) =>
  args.map((arg) => (typeof arg === 'string' ? redactSecrets(arg) : arg));

// Diagnostics go to stderr so `--json` output stays parseable
export const safeLog = {
  error: (message: string, ...args: unknown[]) => {
    console.error(redactSecrets(message), ...redactArgs(args));
  },

  warn: (message: string, ...args: unknown[]) => {
    console.error(redactSecrets(message), ...redactArgs(args));
  },
};
