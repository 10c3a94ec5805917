import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import logger from '../logger.js';

export interface Router {
  handle(req: IncomingMessage, res: ServerResponse): boolean;
  close?(): void;
}

export interface HttpServerOptions {
  port?: number;
  host?: string;
  routers: Router[];
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8080;
  const host = options.host ?? '0.0.0.0';
  const routers = options.routers;

  const server = http.createServer((req, res) => {
    try {
      for (const router of routers) {
        if (router.handle(req, res)) {
          return;
        }
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  server.on('close', () => {
    for (const router of routers) {
      router.close?.();
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}

export default startHttpServer;
