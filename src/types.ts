// src/types.ts

import type { AxiosInstance } from 'axios';
import type { LoggerConfig } from './observability/Logger';

export interface KeyServiceConfig {
  /** Base URL of the service (`https://keys.sylabs.io` when empty). Accepts http, https, hkp and hkps. */
  baseURL?: string;
  /** Sent as `Authorization: BEARER <token>` on each request when non-empty. */
  authToken?: string;
  /** Sent as `User-Agent` on each request when non-empty. */
  userAgent?: string;
  /** Transport used by callers to send built requests. Defaults to the shared axios instance. */
  httpClient?: AxiosInstance;
  logging?: LoggerConfig;
}

/**
 * Pagination state handed between callers and higher-level listing code.
 * Never read or advanced by the client itself.
 */
export interface PageDetails {
  /** Maximum results per page (server may ignore or return fewer). */
  size: number;
  /** Continuation token; empty for the first or last page. */
  token: string;
}

export interface ClientDescriptor {
  readonly baseURL: URL;
  readonly authToken?: string;
  readonly userAgent?: string;
  readonly httpClient: AxiosInstance;
}
