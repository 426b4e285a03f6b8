// tests/integration/request-dispatch.test.ts

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { Readable } from 'stream';
import nock from 'nock';
import axios from 'axios';
import { KeyServiceClient } from '../../src/client';

describe('Sending built requests', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('should reach an hkp server on port 11371 with credentials', async () => {
    const scope = nock('http://keys.example.org:11371')
      .get('/pks/lookup')
      .query({ op: 'get', search: '0xDEADBEEF' })
      .matchHeader('authorization', 'BEARER test-token')
      .matchHeader('user-agent', 'myagent/1.0')
      .reply(200, 'armored-key-data');

    const client = KeyServiceClient.create({
      baseURL: 'hkp://keys.example.org',
      authToken: 'test-token',
      userAgent: 'myagent/1.0',
      httpClient: axios.create(),
    });

    const response = await client.httpClient.request(
      client.newRequest('GET', '/pks/lookup', 'op=get&search=0xDEADBEEF')
    );

    expect(scope.isDone()).toBe(true);
    expect(response.status).toBe(200);
    expect(response.data).toBe('armored-key-data');
  });

  it('should send a streamed body', async () => {
    const scope = nock('https://keys.example.org')
      .post('/pks/add', 'keytext=armored-key-data')
      .reply(200);

    const client = KeyServiceClient.create({
      baseURL: 'hkps://keys.example.org',
      httpClient: axios.create(),
    });
    const body = Readable.from([Buffer.from('keytext=armored-key-data')]);

    const response = await client.httpClient.request(client.newRequest('POST', '/pks/add', '', body));

    expect(scope.isDone()).toBe(true);
    expect(response.status).toBe(200);
  });

  it('should omit Authorization without a token', async () => {
    const scope = nock('https://keys.example.org', { badheaders: ['authorization'] })
      .get('/v1/keys')
      .query({ fingerprint: 'AA' })
      .reply(200, { keys: [] });

    const client = KeyServiceClient.create({
      baseURL: 'https://keys.example.org',
      httpClient: axios.create(),
    });

    const response = await client.httpClient.request(
      client.newRequest('GET', '/v1/keys', 'fingerprint=AA')
    );

    expect(scope.isDone()).toBe(true);
    expect(response.data).toEqual({ keys: [] });
  });
});
