// src/config/ConfigValidator.ts

import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import type { KeyServiceConfig } from '../types';
import { ConfigError } from '../utils/errors';

const isHttpClient = (value: unknown): value is AxiosInstance =>
  (typeof value === 'function' || (typeof value === 'object' && value !== null)) &&
  'request' in value &&
  typeof value.request === 'function';

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Base URL is only type-checked here; parsing and scheme checks happen at client construction
export const KeyServiceConfigSchema = z.object({
  baseURL: z.string().optional(),
  authToken: z.string().optional(),
  userAgent: z.string().optional(),
  httpClient: z
    .custom<AxiosInstance>(isHttpClient, { message: 'httpClient must expose a request() function' })
    .optional(),
  logging: LoggerConfigSchema,
});

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate key service client configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {ConfigError} If a field has the wrong type, listing every issue
 */
export function validateConfig(config: unknown): KeyServiceConfig {
  const result = KeyServiceConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigError(`Invalid key service configuration: ${errors.join('; ')}`, errors);
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: KeyServiceConfig, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: KeyServiceConfig } | { success: false; errors: string[] } {
  const result = KeyServiceConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}
