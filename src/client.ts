// src/client.ts

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ClientDescriptor, KeyServiceConfig } from './types';
import type { KeyServiceRequest, RequestBody } from './core/http/types';
import { RequestBuilder } from './core/http/RequestBuilder';
import { normalizeURL } from './core/url/SchemeNormalizer';
import { Logger } from './observability/Logger';
import { validateConfig } from './config/ConfigValidator';
import { InvalidBaseURLError, UnsupportedSchemeError } from './utils/errors';

export const DEFAULT_BASE_URL = 'https://keys.sylabs.io';

const SCHEME_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:/;

/** Configuration with every field left at its default. */
export const DEFAULT_CONFIG: Readonly<KeyServiceConfig> = Object.freeze({});

export class KeyServiceClient implements ClientDescriptor {
  readonly authToken?: string;
  readonly userAgent?: string;
  readonly httpClient: AxiosInstance;

  private readonly base: URL;
  private readonly requests: RequestBuilder;

  private constructor(base: URL, config: KeyServiceConfig, logger: Logger) {
    this.base = base;
    this.authToken = config.authToken;
    this.userAgent = config.userAgent;
    this.httpClient = config.httpClient ?? axios;
    this.requests = new RequestBuilder(this, logger);

    Object.freeze(this);
  }

  /**
   * Create a key service client
   *
   * Validates the configuration, resolves the base URL (falling back to
   * `https://keys.sylabs.io`) and maps legacy `hkp`/`hkps` schemes onto
   * `http`/`https`. No network access takes place.
   *
   * @param config - Client configuration; `null` or omitted means all defaults
   * @returns Immutable client, safe to share between callers
   * @throws {ConfigError} If a configuration field has the wrong type
   * @throws {InvalidBaseURLError} If the base URL cannot be parsed
   * @throws {UnsupportedSchemeError} If the base URL scheme is not http, https, hkp or hkps,
   *   or is missing (`scheme` is then empty)
   *
   * @example
   * ```typescript
   * const client = KeyServiceClient.create({
   *   baseURL: 'hkps://keys.example.org',
   *   authToken: process.env.KEYSERVICE_TOKEN,
   *   userAgent: 'my-tool/1.0',
   * });
   * const req = client.newRequest('GET', '/pks/lookup', 'op=get&search=0xDEADBEEF');
   * const res = await client.httpClient.request(req);
   * ```
   */
  static create(config?: KeyServiceConfig | null): KeyServiceClient {
    const validated = validateConfig(config ?? DEFAULT_CONFIG);
    const logger = new Logger(validated.logging);

    const raw = validated.baseURL ? validated.baseURL : DEFAULT_BASE_URL;
    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch (error) {
      // A string without a scheme is a scheme-less reference, not a malformed URL
      if (!SCHEME_PREFIX.test(raw)) {
        throw new UnsupportedSchemeError('');
      }
      throw new InvalidBaseURLError(raw, { cause: error });
    }

    const client = new KeyServiceClient(normalizeURL(parsed), validated, logger);

    logger.debug('Key service client created', {
      baseURL: client.base.href,
      hasAuthToken: Boolean(client.authToken),
      userAgent: client.userAgent,
      defaultHttpClient: client.httpClient === axios,
    });

    return client;
  }

  /** Base URL after scheme normalization. Each read returns a new copy. */
  get baseURL(): URL {
    return new URL(this.base.href);
  }

  /**
   * Build a request against the base URL
   *
   * @param method - HTTP method token; empty means GET
   * @param path - Path relative to the base URL, already escaped (`%2F` is sent as-is)
   * @param rawQuery - Already-encoded query string, inserted verbatim
   * @param body - Optional single-use body stream; ownership passes to the request
   * @throws {RequestConstructionError} If the method or body is invalid
   */
  newRequest(method: string, path: string, rawQuery = '', body?: RequestBody): KeyServiceRequest {
    return this.requests.build(method, path, rawQuery, body);
  }
}
