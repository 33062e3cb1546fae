import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GenerationError } from '../lib/errors.js';
import type { ChatChunk } from './ollama.js';
import { OllamaClient } from './ollama.js';

type Handler = (req: http.IncomingMessage, body: string, res: http.ServerResponse) => void;

describe('OllamaClient', () => {
  let server: http.Server;
  let baseUrl: string;
  let handler: Handler;
  let lastBody: string;

  beforeEach(async () => {
    handler = (_req, _body, res) => res.writeHead(404).end();
    server = http.createServer((req, res) => {
      let body = '';
      req.on('data', (c: Buffer) => (body += c.toString('utf8')));
      req.on('end', () => {
        lastBody = body;
        handler(req, body, res);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') throw new Error('fake backend is not listening');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function collect(client: OllamaClient): Promise<ChatChunk[]> {
    const out: ChatChunk[] = [];
    const request = { model: 'test-model', messages: [{ role: 'user' as const, content: 'hi' }] };
    for await (const chunk of client.chat(request, new AbortController().signal)) out.push(chunk);
    return out;
  }

  it('probes /api/version for reachability', async () => {
    handler = (req, _body, res) => {
      if (req.url === '/api/version') res.writeHead(200, { 'content-type': 'application/json' }).end('{"version":"0.5.0"}');
      else res.writeHead(404).end();
    };
    expect(await new OllamaClient(baseUrl).reachable()).toBe(true);
  });

  it('reports an unreachable backend without throwing', async () => {
    expect(await new OllamaClient('http://127.0.0.1:1', { probeTimeoutMs: 500 }).reachable()).toBe(false);
  });

  it('streams newline-delimited chunks split across writes', async () => {
    handler = (_req, _body, res) => {
      res.writeHead(200, { 'content-type': 'application/x-ndjson' });
      res.write('{"message":{"content":"Hel"},"done":false}\n{"message":{"con');
      res.write('tent":"lo"},"done":false}\n');
      res.end('{"message":{"content":""},"done":true}\n');
    };

    const chunks = await collect(new OllamaClient(baseUrl));

    expect(chunks).toEqual([
      { content: 'Hel', done: false },
      { content: 'lo', done: false },
      { content: '', done: true }
    ]);
    expect(JSON.parse(lastBody)).toMatchObject({ model: 'test-model', stream: true });
  });

  it('turns an error line into a backend failure', async () => {
    handler = (_req, _body, res) => {
      res.writeHead(200, { 'content-type': 'application/x-ndjson' });
      res.end('{"error":"model not found"}\n');
    };

    await expect(collect(new OllamaClient(baseUrl))).rejects.toThrow(
      new GenerationError('BackendFailed', 'Backend error: model not found')
    );
  });

  it('rejects non-2xx responses', async () => {
    handler = (_req, _body, res) => res.writeHead(500).end('boom');

    await expect(collect(new OllamaClient(baseUrl))).rejects.toMatchObject({
      code: 'BackendFailed',
      message: 'Ollama chat failed (500): boom'
    });
  });
});
