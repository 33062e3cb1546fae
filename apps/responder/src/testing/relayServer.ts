import http from 'node:http';
import type { AddressInfo } from 'node:net';

export type RelayHit = { headers: http.IncomingHttpHeaders; body: unknown };

/** A local HTTP endpoint standing in for the relay service. */
export class LocalRelay {
  readonly hits: RelayHit[] = [];
  status = 200;
  private readonly server: http.Server;

  constructor() {
    this.server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (c: Buffer) => chunks.push(c));
      req.on('end', () => {
        const raw = Buffer.concat(chunks).toString('utf8');
        this.hits.push({ headers: req.headers, body: raw ? JSON.parse(raw) : null });
        res.writeHead(this.status, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ ok: this.status < 300 }));
      });
    });
  }

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const { port } = this.addressInfo();
    return `http://127.0.0.1:${port}/hooks/relay`;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => this.server.close((e) => (e ? reject(e) : resolve())));
  }

  private addressInfo(): AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === 'string') throw new Error('relay server is not listening');
    return address;
  }
}
