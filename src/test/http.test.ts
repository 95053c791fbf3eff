import {once} from 'events';
import {type Server, createServer} from 'http';
import {text} from 'stream/consumers';

import {
  HTTPStatusError,
  NodeHTTPClient,
  ResponseFormatError,
  TimeoutError,
  TransportError,
} from '../library/index.js';

let server: Server;
let baseURL: string;

beforeAll(async () => {
  server = createServer((request, response) => {
    switch (request.url) {
      case '/json':
        response.setHeader('content-type', 'application/json; charset=utf-8');
        response.end('{"ok":true}');
        break;
      case '/problem':
        response.setHeader('content-type', 'application/problem+json');
        response.end('{"title":"problem"}');
        break;
      case '/text':
        response.setHeader('content-type', 'text/plain');
        response.end(' 192.0.2.1\n');
        break;
      case '/broken-json':
        response.setHeader('content-type', 'application/json');
        response.end('{"ok":');
        break;
      case '/echo':
        void text(request).then(body => {
          response.setHeader('content-type', 'application/json');
          response.end(
            JSON.stringify({
              method: request.method,
              authorization: request.headers.authorization,
              contentType: request.headers['content-type'],
              body: JSON.parse(body),
            }),
          );
        });
        break;
      case '/slow':
        // Never answers.
        break;
      default:
        response.statusCode = 404;
        response.end('not found');
        break;
    }
  });

  baseURL = `http://127.0.0.1:${await listen(server)}`;
});

afterAll(() => {
  server.closeAllConnections();
  server.close();
});

test('parses json responses', async () => {
  const client = new NodeHTTPClient();

  await expect(
    client.request('GET', `${baseURL}/json`, {expectJSON: true}),
  ).resolves.toEqual({ok: true});

  await expect(
    client.request('GET', `${baseURL}/problem`, {expectJSON: true}),
  ).resolves.toEqual({title: 'problem'});
});

test('returns raw text when json is not expected', async () => {
  const client = new NodeHTTPClient();

  await expect(client.request('GET', `${baseURL}/text`)).resolves.toBe(
    ' 192.0.2.1\n',
  );

  await expect(client.request('GET', `${baseURL}/json`)).resolves.toBe(
    '{"ok":true}',
  );
});

test('rejects non-json content type when json is expected', async () => {
  const client = new NodeHTTPClient();

  await expect(
    client.request('GET', `${baseURL}/text`, {expectJSON: true}),
  ).rejects.toThrow(ResponseFormatError);
});

test('rejects unparsable json', async () => {
  const client = new NodeHTTPClient();

  await expect(
    client.request('GET', `${baseURL}/broken-json`, {expectJSON: true}),
  ).rejects.toThrow(ResponseFormatError);
});

test('rejects non-2xx status as transport error', async () => {
  const client = new NodeHTTPClient();

  const promise = client.request('GET', `${baseURL}/missing`);

  await expect(promise).rejects.toThrow(HTTPStatusError);
  await expect(promise).rejects.toThrow(TransportError);
  await expect(promise).rejects.toMatchObject({
    status: 404,
    body: 'not found',
  });
});

test('sends json body with default and request headers', async () => {
  const client = new NodeHTTPClient({
    headers: {authorization: 'Bearer test-token'},
  });

  await expect(
    client.request('PATCH', `${baseURL}/echo`, {
      expectJSON: true,
      body: {content: '192.0.2.100'},
    }),
  ).resolves.toEqual({
    method: 'PATCH',
    authorization: 'Bearer test-token',
    contentType: 'application/json',
    body: {content: '192.0.2.100'},
  });
});

test('times out', async () => {
  const client = new NodeHTTPClient();

  await expect(
    client.request('GET', `${baseURL}/slow`, {timeout: 50}),
  ).rejects.toThrow(TimeoutError);
});

test('wraps connection failures', async () => {
  const closedServer = createServer();

  const port = await listen(closedServer);

  closedServer.close();

  await once(closedServer, 'close');

  const client = new NodeHTTPClient();

  const promise = client.request('GET', `http://127.0.0.1:${port}/`);

  await expect(promise).rejects.toThrow(TransportError);
  await expect(promise).rejects.toThrow(/ECONNREFUSED/);
});

async function listen(server: Server): Promise<number> {
  server.listen(0, '127.0.0.1');

  await once(server, 'listening');

  const address = server.address();

  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }

  return address.port;
}
