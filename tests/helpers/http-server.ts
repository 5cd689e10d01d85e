import { createServer } from 'node:http';
import type { IncomingHttpHeaders } from 'node:http';

// In-process stand-in for a protocol server.

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface StubReply {
  status?: number;
  headers?: Record<string, string>;
  /** Objects are JSON-encoded; strings are sent as-is. */
  body?: unknown;
}

export type StubHandler = (request: RecordedRequest, origin: string) => StubReply;

export interface StubServer {
  readonly origin: string;
  readonly requests: RecordedRequest[];
  close(): Promise<void>;
}

export async function startStubServer(handler: StubHandler): Promise<StubServer> {
  const requests: RecordedRequest[] = [];
  let origin = '';

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf-8'),
      };
      requests.push(recorded);

      const reply = handler(recorded, origin);
      const payload =
        reply.body === undefined
          ? ''
          : typeof reply.body === 'string'
            ? reply.body
            : JSON.stringify(reply.body);
      res.writeHead(reply.status ?? 200, {
        'Content-Type': 'application/json;charset=utf-8',
        ...reply.headers,
      });
      res.end(payload);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('stub server has no TCP address');
  }
  origin = `http://127.0.0.1:${String(address.port)}`;

  return {
    origin,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** `{sessionId, status, value}` with success status. */
export function ok(value: unknown, sessionId: string | null = null): StubReply {
  return { body: { sessionId, status: 0, value } };
}
