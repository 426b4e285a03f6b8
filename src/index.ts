// src/index.ts

export { KeyServiceClient, DEFAULT_BASE_URL, DEFAULT_CONFIG } from './client';
export type { KeyServiceConfig, ClientDescriptor, PageDetails } from './types';
export type { KeyServiceRequest, RequestBody } from './core/http/types';
export type { LoggerConfig } from './observability/Logger';
export { normalizeURL, isSupportedScheme, HKP_DEFAULT_PORT } from './core/url/SchemeNormalizer';
export { validateConfig, validateConfigSafe, KeyServiceConfigSchema } from './config/ConfigValidator';

// Export error classes for error handling
export {
  KeyServiceError,
  ConfigError,
  InvalidBaseURLError,
  UnsupportedSchemeError,
  RequestConstructionError,
} from './utils/errors';
