// src/core/http/types.ts

import type { Readable } from 'stream';
import type { AxiosHeaders } from 'axios';

/**
 * A ready-to-send request. Shaped as an axios request config, so it can be
 * passed straight to `client.httpClient.request()`.
 */
export interface KeyServiceRequest {
  method: string;
  /** Absolute URL on the client's base scheme, host and port. */
  url: string;
  headers: AxiosHeaders;
  /** Single-use body stream, owned by whoever sends the request. */
  data?: Readable;
}

export type RequestBody = Readable | null | undefined;
