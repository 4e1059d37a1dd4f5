// ============================================
// HTTP Routes
// One-shot command endpoint for the interpreter, plus history and health
// ============================================

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { CommandHttpResponse, HistoryQuery } from '#shared';
import type { SimulationContext } from '../systems';
import { queryHistory } from '../history/historyQuery';
import { logger, logCommandsQueued } from '../logger';
import { parseNumber } from '../motion/commands';
import { readCommandList } from './payloads';

// Request bodies beyond this are refused
export const MAX_BODY_BYTES = 64 * 1024;

export interface RouteResponse {
  statusCode: number;
  body: unknown;
}

/**
 * POST /command body -> queued commands. HTTP callers get no outcome back,
 * the result is visible in logs and telemetry.
 */
export function handleCommandBody(ctx: SimulationContext, body: string): RouteResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    const response: CommandHttpResponse = {
      status: 'error',
      error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
    return { statusCode: 400, body: response };
  }

  const commands = readCommandList(payload);
  if (!commands) {
    const response: CommandHttpResponse = { status: 'error', error: 'Missing "command" field' };
    return { statusCode: 400, body: response };
  }

  for (const command of commands) {
    ctx.commands.enqueue({ command, replyTo: null });
  }
  logCommandsQueued('http', commands);

  const response: CommandHttpResponse = { status: 'ok', queued: commands.length };
  return { statusCode: 200, body: response };
}

/**
 * GET /history?tag=&name=&count= -> query contract result
 */
export function handleHistoryRequest(ctx: SimulationContext, params: URLSearchParams): RouteResponse {
  const query: Record<keyof HistoryQuery, unknown> = {
    tag: params.get('tag') ?? undefined,
    name: params.get('name') ?? undefined,
    count: undefined,
  };
  const count = params.get('count');
  if (count !== null) {
    // Unparseable counts stay as strings and fail validation
    query.count = parseNumber(count) ?? count;
  }
  return { statusCode: 200, body: queryHistory(ctx.history, query) };
}

function sendJson(res: ServerResponse, { statusCode, body }: RouteResponse): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage, limit: number): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(tooLarge ? null : Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

/**
 * Request listener for the HTTP server socket.io is attached to.
 * socket.io answers its own path before this runs.
 */
export function createHttpHandler(ctx: SimulationContext) {
  return (req: IncomingMessage, res: ServerResponse): void => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && url.pathname === '/health') {
      sendJson(res, { statusCode: 200, body: { status: 'ok' } });
      return;
    }

    if (req.method === 'GET' && url.pathname === '/history') {
      sendJson(res, handleHistoryRequest(ctx, url.searchParams));
      return;
    }

    if (req.method === 'POST' && url.pathname === '/command') {
      readBody(req, MAX_BODY_BYTES)
        .then((body) => {
          if (body === null) {
            const response: CommandHttpResponse = { status: 'error', error: 'Request body too large' };
            sendJson(res, { statusCode: 413, body: response });
            return;
          }
          sendJson(res, handleCommandBody(ctx, body));
        })
        .catch((error: unknown) => {
          logger.error(
            {
              event: 'http_request_error',
              path: url.pathname,
              error: error instanceof Error ? error.message : String(error),
            },
            'Failed to read request body'
          );
          if (!res.headersSent) {
            sendJson(res, { statusCode: 500, body: { status: 'error', error: 'Internal error' } });
          }
        });
      return;
    }

    sendJson(res, { statusCode: 404, body: { status: 'error', error: 'Not found' } });
  };
}
