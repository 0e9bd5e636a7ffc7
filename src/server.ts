/**
 * HTTP(S) server for the mutating webhook.
 * POST /mutate (or /) with an AdmissionReview body; GET /healthz and /readyz for probes.
 * The API server only calls webhooks over HTTPS, so plain HTTP is for local use or
 * behind a TLS-terminating proxy.
 */

import { readFileSync } from 'node:fs';
import { createServer } from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { createServer as createHttpsServer } from 'node:https';
import type { Server } from 'node:net';
import type { TlsFiles } from './config.js';
import { DEFAULT_PORT } from './config.js';
import { handleAdmissionReview } from './handler.js';
import type { Logger } from './logger.js';
import { rootLogger } from './logger.js';
import type { InjectorOptions } from './types.js';

export const MAX_BODY_BYTES = 1_048_576;

export interface ServerOptions {
  port?: number;
  tls?: TlsFiles;
  injectorOptions?: Partial<InjectorOptions>;
  logger?: Logger;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain' });
  res.end(body);
}

/**
 * Create and return a server that handles AdmissionReview POSTs.
 * Does not start listening; call server.listen().
 */
export function createWebhookServer(options: ServerOptions = {}): { server: Server; port: number } {
  const port = options.port ?? DEFAULT_PORT;
  const logger = options.logger ?? rootLogger;
  const injectorOptions = options.injectorOptions;

  const listener = (req: IncomingMessage, res: ServerResponse): void => {
    const path = (req.url ?? '').split('?')[0];

    if (req.method === 'GET' && (path === '/healthz' || path === '/readyz')) {
      sendText(res, 200, 'ok');
      return;
    }
    if (req.method !== 'POST' || (path !== '/' && path !== '/mutate')) {
      sendText(res, 404, 'Not Found');
      return;
    }

    const chunks: Buffer[] = [];
    let received = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      received += chunk.length;
      if (received > MAX_BODY_BYTES) {
        tooLarge = true;
        sendJson(res, 413, { error: 'Request body too large' });
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (tooLarge) return;
      const body = Buffer.concat(chunks).toString('utf8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (err) {
        logger.warn('Invalid JSON body', { error: err instanceof Error ? err.message : String(err) });
        sendJson(res, 400, { error: 'Invalid JSON body' });
        return;
      }

      const response = handleAdmissionReview(parsed, injectorOptions, logger);
      sendJson(res, 200, response);
    });
    req.on('error', (err) => {
      logger.error('Request stream failed', { error: err.message });
      if (!res.headersSent) {
        sendText(res, 500, 'Internal Server Error');
      }
    });
  };

  const server: Server = options.tls
    ? createHttpsServer({ cert: readFileSync(options.tls.certFile), key: readFileSync(options.tls.keyFile) }, listener)
    : createServer(listener);

  return { server, port };
}

/**
 * Start the webhook server and resolve once it is listening.
 */
export function startServer(options: ServerOptions = {}): Promise<Server> {
  const logger = options.logger ?? rootLogger;
  const { server, port } = createWebhookServer(options);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info(`Workload identity injector listening on port ${port}`, { tls: options.tls !== undefined });
      resolve(server);
    });
  });
}
