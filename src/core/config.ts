/**
 * Configuration
 *
 * Resolves runtime settings from command-line flags, environment variables
 * and defaults (in that order of precedence), validated with zod.
 *
 * @module config
 */

import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_API_URL } from './api-client.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_PAGE_SIZE = 10;
export const DEFAULT_KEY_FILE = '.tavus_api_key';

export const AppConfigSchema = z.object({
  apiKey: z.string().trim().min(1).nullable(),
  apiUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  pageSize: z.coerce.number().int().positive(),
  keyFile: z.string().min(1),
  verbose: z.boolean(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Values supplied on the command line
 */
export interface ConfigOverrides {
  apiKey?: string;
  apiUrl?: string;
  pageSize?: string | number;
  keyFile?: string;
  verbose?: boolean;
}

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Build the application configuration
 *
 * @param overrides - Flags from the command line
 * @param env - Environment to read (defaults to process.env)
 * @param cwd - Directory the key file path is resolved against
 * @throws ConfigurationError when a value fails validation
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const raw = {
    apiKey: present(overrides.apiKey) ?? present(env.TAVUS_API_KEY) ?? null,
    apiUrl: present(overrides.apiUrl) ?? present(env.TAVUS_API_URL) ?? DEFAULT_API_URL,
    pageSize: overrides.pageSize ?? present(env.TAVUS_PAGE_SIZE) ?? DEFAULT_PAGE_SIZE,
    keyFile: path.resolve(cwd, present(overrides.keyFile) ?? present(env.TAVUS_KEY_FILE) ?? DEFAULT_KEY_FILE),
    verbose: overrides.verbose ?? Boolean(present(env.DEBUG)),
  };

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'config';
    throw new ConfigurationError(`Invalid configuration for ${field}: ${issue?.message ?? 'invalid value'}`);
  }

  return parsed.data;
}
