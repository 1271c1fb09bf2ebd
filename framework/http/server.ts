/**
 * HTTP Server
 *
 * Serves a Fetch-style `(request) => Response` handler over node:http.
 * Incoming messages are buffered into `Request` objects and the returned
 * `Response` is written back to the socket.
 */

import { createServer, type IncomingMessage, type Server as NodeServer, type ServerResponse } from 'node:http';

export type FetchHandler = (request: Request) => Promise<Response> | Response;

export interface ServerOptions {
  port?: number;
  hostname?: string;
  onListen?: (addr: { hostname: string; port: number }) => void;
  onError?: (error: unknown) => Response;
}

/**
 * Convert a node:http request into a Fetch `Request`
 */
export async function toRequest(req: IncomingMessage, fallbackHost: string): Promise<Request> {
  const host = req.headers.host ?? fallbackHost;
  const url = new URL(req.url ?? '/', `http://${host}`);

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  if (method === 'GET' || method === 'HEAD') {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, { method, headers, body: new Uint8Array(Buffer.concat(chunks)) });
}

/**
 * Write a Fetch `Response` to a node:http response
 */
export async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;

  const cookies = response.headers.getSetCookie();
  response.headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      res.setHeader(name, value);
    }
  });
  if (cookies.length > 0) {
    res.setHeader('Set-Cookie', cookies);
  }

  if (!response.body) {
    res.end();
    return;
  }

  const body = new Uint8Array(await response.arrayBuffer());
  res.end(body);
}

/**
 * HTTP server for a Fetch handler
 */
export class Server {
  private server: NodeServer | null = null;
  private options: Required<Pick<ServerOptions, 'port' | 'hostname'>> & ServerOptions;

  constructor(private handler: FetchHandler, options: ServerOptions = {}) {
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
    };
  }

  /**
   * Start listening. Resolves once the socket is bound.
   */
  listen(): Promise<void> {
    const fallbackHost = `${this.options.hostname}:${this.options.port}`;

    const server = createServer((req, res) => {
      this.dispatch(req, res, fallbackHost).catch((error: unknown) => {
        console.error('Failed to write response:', error);
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.hostname, () => {
        server.off('error', reject);
        const address = server.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.options.port;
        this.options.onListen?.({ hostname: this.options.hostname, port });
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
  }

  private async dispatch(req: IncomingMessage, res: ServerResponse, fallbackHost: string): Promise<void> {
    let response: Response;
    try {
      response = await this.handler(await toRequest(req, fallbackHost));
    } catch (error) {
      console.error('Request error:', error);
      response = this.options.onError
        ? this.options.onError(error)
        : new Response('Internal Server Error', { status: 500 });
    }
    await writeResponse(response, res);
  }
}
