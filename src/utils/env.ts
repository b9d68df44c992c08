import * as dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { Credentials } from '../types';

/**
 * Environment variables holding the login material.
 */
const credentialsEnvSchema = z.object({
  NDAX_ACCOUNT_ID: z.coerce.number().int().positive(),
  NDAX_USERNAME: z.string().min(1),
  NDAX_PASSWORD: z.string().min(1),
  NDAX_2FA_SECRET: z.string().min(1),
});

/**
 * Reads credentials from environment variables.
 *
 * @param env - Variable source (default: process.env)
 * @throws {ConfigError} Naming every variable that is missing or invalid; values are never included
 *
 * @example
 * ```typescript
 * const credentials = loadCredentials({ ...process.env, ...loadEnvFile('.env') });
 * ```
 */
export function loadCredentials(env: Record<string, string | undefined> = process.env): Credentials {
  const result = credentialsEnvSchema.safeParse(env);
  if (!result.success) {
    const names = Array.from(new Set(result.error.issues.map(issue => String(issue.path[0]))));
    throw new ConfigError(`Missing or invalid environment variable(s): ${names.join(', ')}`);
  }

  return {
    accountId: result.data.NDAX_ACCOUNT_ID,
    username: result.data.NDAX_USERNAME,
    password: result.data.NDAX_PASSWORD,
    twoFactorSecret: result.data.NDAX_2FA_SECRET,
  };
}

/**
 * Parses a dotenv file without touching process.env.
 *
 * @throws {ConfigError} If the file cannot be read
 */
export function loadEnvFile(path: string = '.env'): Record<string, string> {
  let contents: Buffer;
  try {
    contents = readFileSync(path);
  } catch (error) {
    throw new ConfigError(`Cannot read env file ${path}`, { cause: error });
  }
  return dotenv.parse(contents);
}
