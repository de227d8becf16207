import http from 'http';
import type { AddressInfo } from 'net';
import type { EventHub } from './hub.ts';
import { NDJSON_CONTENT_TYPE, STATUS_PATH, STREAM_PATH } from './protocol.ts';

/**
 * Handle returned when creating a stream server. Ensures proper cleanup.
 */
export interface StreamServer {
  server: http.Server;
  /** host:port the server is bound to. */
  address: string;
  /** Stop accepting connections and wait for open ones, destroying stragglers after `graceMs`. */
  close: (graceMs?: number) => Promise<void>;
}

export interface StreamServerOptions {
  host?: string;
  port?: number;
  debug?: boolean;
  /** Extra fields reported by GET /status. */
  status?: () => Record<string, unknown>;
}

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Route requests: GET /stream attaches a hub subscriber and holds the response
 * open; GET /status reports daemon state.
 */
function createRequestHandler(
  hub: EventHub,
  options: StreamServerOptions,
): http.RequestListener {
  return (req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (req.method !== 'GET') {
      res.setHeader('allow', 'GET');
      sendJson(res, 405, { error: `Method ${req.method ?? ''} not allowed` });
      return;
    }

    if (pathname === STREAM_PATH) {
      // Disable Nagle so each event line leaves immediately.
      req.socket.setNoDelay(true);
      req.socket.setKeepAlive(true);
      res.writeHead(200, {
        'content-type': NDJSON_CONTENT_TYPE,
        'cache-control': 'no-cache',
        connection: 'keep-alive',
      });
      res.flushHeaders();
      try {
        hub.attach(res);
      } catch (error) {
        if (options.debug) {
          console.log(
            `[DAEMON] Refusing stream: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
        res.end();
      }
      return;
    }

    if (pathname === STATUS_PATH) {
      sendJson(res, 200, {
        subscribers: hub.subscriberCount,
        published: hub.publishedCount,
        ...(options.status?.() ?? {}),
      });
      return;
    }

    sendJson(res, 404, { error: `Not found: ${pathname}` });
  };
}

/**
 * Bind the daemon's HTTP server on loopback. Port 0 picks a free port.
 */
export async function createStreamServer(
  hub: EventHub,
  options: StreamServerOptions = {},
): Promise<StreamServer> {
  const host = options.host ?? '127.0.0.1';
  const server = http.createServer(createRequestHandler(hub, options));
  // Streams are long-lived; never time them out.
  server.requestTimeout = 0;
  server.headersTimeout = 60_000;
  server.keepAliveTimeout = 5_000;

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    server.once('error', onError);
    server.listen(options.port ?? 0, host, () => {
      server.removeListener('error', onError);
      resolve();
    });
  });

  const bound = server.address();
  if (bound === null || typeof bound === 'string') {
    server.close();
    throw new Error('Stream server did not bind to a TCP address');
  }
  const address = formatAddress(bound);

  server.on('error', (err) => {
    console.error('[DAEMON] Stream server error:', err);
  });

  if (options.debug) {
    console.log(`[DAEMON] Stream server listening on ${address}`);
  }

  return {
    server,
    address,
    close: (graceMs = 2000) =>
      new Promise<void>((resolveClose) => {
        const timer = setTimeout(() => server.closeAllConnections(), graceMs);
        timer.unref();
        server.close(() => {
          clearTimeout(timer);
          resolveClose();
        });
        server.closeIdleConnections();
      }),
  };
}

function formatAddress(info: AddressInfo): string {
  return info.family === 'IPv6' ? `[${info.address}]:${info.port}` : `${info.address}:${info.port}`;
}
