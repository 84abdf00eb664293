/**
 * HTTP Server
 *
 * Wraps node:http with Fetch Request/Response objects. Each incoming
 * message becomes a Request; the listener's Response is written back, and
 * callbacks registered through `hooks.afterResponse` run once the response
 * is closed.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server as NodeServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { buffer } from 'node:stream/consumers';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { RequestHooks, RequestListener } from './types.ts';

export interface ServerOptions {
  port?: number;
  hostname?: string;
  logger?: Logger;
}

/**
 * HTTP server driving a fetch-style listener
 */
export class Server {
  private listener: RequestListener;
  private options: Required<Pick<ServerOptions, 'port' | 'hostname'>> & ServerOptions;
  private logger: Logger;
  private server: NodeServer | null = null;

  constructor(listener: RequestListener, options: ServerOptions = {}) {
    this.listener = listener;
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
    };
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Start listening. Resolves with the bound address; port 0 picks a free port.
   */
  listen(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('Server is already listening'));
    }

    const server = createServer((req, res) => {
      void this.handle(req, res);
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = null;
        reject(error);
      };

      server.once('error', onError);
      server.listen(this.options.port, this.options.hostname, () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.logger.error('HTTP server error', error);
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not bound to a TCP address'));
          return;
        }

        resolve(address);
      });
    });
  }

  /**
   * Whether the server is accepting connections
   */
  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
      server.closeIdleConnections();
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const callbacks: Array<() => void> = [];
    let closed = false;

    const run = (callback: () => void) => {
      try {
        callback();
      } catch (error) {
        this.logger.error('After-response callback failed', error);
      }
    };

    // A client that disconnects mid-handler closes the response before
    // the handler has registered anything; later callbacks run at once.
    const hooks: RequestHooks = {
      afterResponse: (callback) => {
        if (closed) run(callback);
        else callbacks.push(callback);
      },
    };

    res.once('close', () => {
      closed = true;
      for (const callback of callbacks.splice(0)) {
        run(callback);
      }
    });

    try {
      const request = await toFetchRequest(req);
      const response = await this.listener(request, hooks);
      await writeResponse(res, response);
    } catch (error) {
      this.logger.error('Request error', error, { method: req.method, url: req.url });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end('Internal Server Error');
    }
  }
}

/**
 * Convert an incoming message into a Fetch Request with a buffered body
 */
async function toFetchRequest(req: IncomingMessage): Promise<Request> {
  const method = req.method ?? 'GET';
  const host = req.headers.host ?? 'localhost';
  const url = new URL(req.url ?? '/', `http://${host}`);

  const headers = new Headers();
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    const name = req.rawHeaders[i];
    const value = req.rawHeaders[i + 1];
    if (name !== undefined && value !== undefined && !name.startsWith(':')) {
      headers.append(name, value);
    }
  }

  let body: Buffer | null = null;
  if (method !== 'GET' && method !== 'HEAD') {
    const data = await buffer(req);
    body = data.length > 0 ? data : null;
  }

  return new Request(url, { method, headers, body });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  response.headers.forEach((value, key) => {
    if (key === 'set-cookie') return;
    res.setHeader(key, value);
  });
  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) {
    res.setHeader('set-cookie', cookies);
  }

  const body = Buffer.from(await response.arrayBuffer());
  res.writeHead(response.status);
  res.end(body);
}
