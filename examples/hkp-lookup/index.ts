// Fetches an armored public key from an HKP server.
//
//   KEYSERVER=hkps://keys.example.org npx tsx examples/hkp-lookup/index.ts 0xDEADBEEF

import { KeyServiceClient, KeyServiceError } from '../../src';

async function main() {
  const search = process.argv[2];
  if (!search) {
    console.error('usage: hkp-lookup <key id or fingerprint>');
    process.exit(2);
  }

  const client = KeyServiceClient.create({
    baseURL: process.env.KEYSERVER,
    authToken: process.env.KEYSERVICE_TOKEN,
    userAgent: 'hkp-lookup-example/0.1',
    logging: { level: 'debug', format: 'pretty' },
  });

  const query = new URLSearchParams({ op: 'get', options: 'mr', search }).toString();
  const req = client.newRequest('GET', '/pks/lookup', query);

  const res = await client.httpClient.request<string>({ ...req, responseType: 'text' });
  console.log(res.data);
}

main().catch((error: unknown) => {
  if (error instanceof KeyServiceError) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
