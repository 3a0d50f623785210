/**
 * HTTPClient timeout tests
 *
 * Runs against an in-process server bound to 127.0.0.1.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { HTTPClient, HTTPTimeoutError } from '../../../core/http-client.js';

describe('HTTPClient', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      if (req.url === '/stalled-body') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.write('[');
        return;
      }
      if (req.url === '/stalled-headers') {
        return;
      }
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('[{"lat":"-1.28"}]');
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  it('parses a complete JSON body', async () => {
    const client = new HTTPClient({ timeoutMs: 1000 });

    await expect(client.fetchJSON(`${baseUrl}/ok`)).resolves.toEqual([{ lat: '-1.28' }]);
  });

  it('times out when headers never arrive', async () => {
    const client = new HTTPClient({ timeoutMs: 200 });

    await expect(client.fetchJSON(`${baseUrl}/stalled-headers`)).rejects.toBeInstanceOf(
      HTTPTimeoutError
    );
  });

  it('times out when the body stalls after the headers', async () => {
    const client = new HTTPClient({ timeoutMs: 200 });

    const error = await client.fetchJSON(`${baseUrl}/stalled-body`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPTimeoutError);
    if (error instanceof HTTPTimeoutError) {
      expect(error.timeoutMs).toBe(200);
      expect(error.url).toBe(`${baseUrl}/stalled-body`);
    }
  });
});
