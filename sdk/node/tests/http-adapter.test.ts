import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { HttpAdapter } from '../src/adapters/http';
import { DeviceRestError } from '../src/errors';

type Captured = {
  method?: string;
  url?: string;
  authorization?: string;
  contentType?: string;
  accept?: string;
  body: string;
};

const captured: Captured[] = [];
let server: http.Server;
let baseUrl: string;

const readBody = async (req: http.IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
};

beforeAll(async () => {
  server = http.createServer(async (req, res) => {
    captured.push({
      method: req.method,
      url: req.url,
      authorization: req.headers.authorization,
      contentType: req.headers['content-type'],
      accept: req.headers.accept,
      body: await readBody(req),
    });
    if (req.url === '/api') {
      res.statusCode = 200;
      res.setHeader('Content-Type', 'application/vnd.yang.api+xml');
      res.end('<api><version>0.5</version></api>');
      return;
    }
    if (req.url === '/api/running/devices') {
      res.statusCode = 201;
      res.end();
      return;
    }
    res.statusCode = 404;
    res.setHeader('Content-Type', 'application/json');
    res.end('{"errors":{"error":[{"error-message":"unknown resource"}]}}');
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('mock device is not listening on TCP');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe('HttpAdapter', () => {
  it('sends basic auth and returns the raw body', async () => {
    const adapter = new HttpAdapter({ baseUrl, auth: { username: 'admin', password: 'test-secret' } });

    const response = await adapter.send({ method: 'GET', path: '/api', headers: { Accept: 'application/xml' }, timeout: 2000 });
    adapter.close();

    expect(response.statusCode).toBe(200);
    expect(response.reason).toBe('OK');
    expect(response.body).toBe('<api><version>0.5</version></api>');
    expect(response.headers['content-type']).toBe('application/vnd.yang.api+xml');
    expect(captured[captured.length - 1]).toMatchObject({
      method: 'GET',
      url: '/api',
      authorization: `Basic ${Buffer.from('admin:test-secret').toString('base64')}`,
      accept: 'application/xml',
      body: '',
    });
  });

  it('posts text bodies verbatim with the given headers', async () => {
    const adapter = new HttpAdapter({ baseUrl, auth: { username: 'admin', password: 'test-secret' } });

    const response = await adapter.send({
      method: 'POST',
      path: '/api/running/devices',
      headers: { 'Content-type': 'application/vnd.yang.datastore+json' },
      body: '{"device":{"name":"ce0"}}',
      timeout: 2000,
    });
    adapter.close();

    expect(response.statusCode).toBe(201);
    expect(response.body).toBe('');
    expect(captured[captured.length - 1]).toMatchObject({
      method: 'POST',
      contentType: 'application/vnd.yang.datastore+json',
      body: '{"device":{"name":"ce0"}}',
    });
  });

  it('returns error statuses instead of throwing', async () => {
    const adapter = new HttpAdapter({ baseUrl, auth: { username: 'admin', password: 'test-secret' } });

    const response = await adapter.send({ method: 'DELETE', path: '/api/missing', headers: {}, timeout: 2000 });
    adapter.close();

    expect(response.statusCode).toBe(404);
    expect(response.body).toBe('{"errors":{"error":[{"error-message":"unknown resource"}]}}');
  });

  it('refuses to send once closed', async () => {
    const adapter = new HttpAdapter({ baseUrl, auth: { username: 'admin', password: 'test-secret' } });
    adapter.close();

    expect(adapter.isOpen).toBe(false);
    await expect(adapter.send({ method: 'GET', path: '/api', headers: {}, timeout: 2000 })).rejects.toBeInstanceOf(
      DeviceRestError,
    );
  });
});
