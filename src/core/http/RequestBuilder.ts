// src/core/http/RequestBuilder.ts

import { Readable } from 'stream';
import { AxiosHeaders } from 'axios';
import type { KeyServiceRequest, RequestBody } from './types';
import type { ClientDescriptor } from '../../types';
import type { Logger } from '../../observability/Logger';
import { RequestConstructionError } from '../../utils/errors';

// RFC 7230 token
const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export class RequestBuilder {
  constructor(
    private readonly descriptor: ClientDescriptor,
    private readonly logger: Logger
  ) {}

  /**
   * Build a request for `path` (relative to the base URL) with `rawQuery`
   * inserted as-is. Performs no I/O.
   *
   * `path` is taken as already escaped: `%2F` stays `%2F`, while characters
   * that cannot appear in a path (space, `?`, `#`) are percent-encoded.
   *
   * @throws {RequestConstructionError} On an invalid method token or a body that is not a readable stream
   */
  build(method: string, path: string, rawQuery: string, body?: RequestBody): KeyServiceRequest {
    const verb = method === '' ? 'GET' : method;
    const url = this.resolve(path, rawQuery);

    if (!METHOD_TOKEN.test(verb)) {
      throw new RequestConstructionError(`invalid method "${verb}"`, { method: verb, url });
    }

    if (body !== undefined && body !== null && !(body instanceof Readable)) {
      throw new RequestConstructionError('request body must be a readable stream', {
        method: verb,
        url,
        bodyType: typeof body,
      });
    }

    const headers = new AxiosHeaders();
    if (this.descriptor.authToken) {
      headers.set('Authorization', `BEARER ${this.descriptor.authToken}`);
    }
    if (this.descriptor.userAgent) {
      headers.set('User-Agent', this.descriptor.userAgent);
    }

    const request: KeyServiceRequest = { method: verb, url, headers };
    if (body) {
      request.data = body;
    }

    this.logger.debug('Key service request built', {
      method: verb,
      url,
      headers: headers.toJSON(),
      hasBody: request.data !== undefined,
    });

    return request;
  }

  /**
   * Merge path and query into the base URL (RFC 3986 section 5.2). The path
   * goes through the pathname setter, so it can only ever change the path.
   * The query is appended to the serialized URL untouched, since the search
   * setter would re-encode it.
   */
  private resolve(path: string, rawQuery: string): string {
    const url = new URL(this.descriptor.baseURL.href);

    if (path === '' && rawQuery === '') {
      return url.href;
    }

    if (path !== '') {
      url.pathname = path.startsWith('/') ? path : baseDirectory(url.pathname) + path;
    }
    url.search = '';
    url.hash = '';

    return rawQuery === '' ? url.href : `${url.href}?${rawQuery}`;
  }
}

function baseDirectory(pathname: string): string {
  return pathname.slice(0, pathname.lastIndexOf('/') + 1);
}
