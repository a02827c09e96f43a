/**
 * Client configuration: credentials, slugs and API base URL.
 *
 * Built from explicit values (`createConfig`) or from the process
 * environment (`configFromEnv`). The access key is wrapped in a
 * SecretString so it never shows up in logs, JSON or inspected objects.
 */

import { z } from 'zod';
import { TenderlyError } from './error.js';
import {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  ENV_ACCESS_KEY,
  ENV_ACCOUNT_SLUG,
  ENV_API_URL,
  ENV_PROJECT_SLUG,
} from './internal/constants.js';

const REDACTED = '[REDACTED]';
const inspectCustom: unique symbol = Symbol.for('nodejs.util.inspect.custom');

export class SecretString {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  reveal(): string {
    return this.#value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspectCustom](): string {
    return REDACTED;
  }
}

export const ConfigOptionsSchema = z.object({
  // sent verbatim as a header value
  accessKey: z.string().min(1, 'must not be empty').regex(/^[\x21-\x7e]+$/, 'must be a printable token'),
  accountSlug: z.string().min(1, 'must not be empty'),
  projectSlug: z.string().min(1, 'must not be empty'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
});
export type ConfigOptions = z.input<typeof ConfigOptionsSchema>;

export interface TenderlyConfig {
  readonly accessKey: SecretString;
  readonly accountSlug: string;
  readonly projectSlug: string;
  readonly baseUrl: string;
  readonly timeout: number;
}

export function createConfig(options: ConfigOptions): TenderlyConfig {
  const parsed = ConfigOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'config';
    throw TenderlyError.validation(`Invalid configuration: ${field}: ${issue?.message ?? 'invalid'}`);
  }
  const { accessKey, accountSlug, projectSlug, baseUrl, timeout } = parsed.data;
  return Object.freeze({
    accessKey: new SecretString(accessKey),
    accountSlug,
    projectSlug,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    timeout,
  });
}

/**
 * Read configuration from environment variables.
 * @throws TenderlyError (VALIDATION) naming the first missing variable
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): TenderlyConfig {
  const read = (name: string): string => {
    const value = env[name];
    if (value === undefined || value.length === 0) {
      throw TenderlyError.validation(`Missing environment variable ${name}`, 'MISSING_ENV');
    }
    return value;
  };

  const baseUrl = env[ENV_API_URL];
  return createConfig({
    accessKey: read(ENV_ACCESS_KEY),
    accountSlug: read(ENV_ACCOUNT_SLUG),
    projectSlug: read(ENV_PROJECT_SLUG),
    ...(baseUrl ? { baseUrl } : {}),
  });
}
