/**
 * Express adapter for route modules.
 *
 * A route module exports `loader` (GET/HEAD) and/or `action` (every other method),
 * each taking a Fetch Request plus path params and returning a Fetch Response.
 */

import type { Request as ExpressRequest, RequestHandler, Response as ExpressResponse } from 'express';

export interface RouteArgs {
  request: Request;
  params: Record<string, string | undefined>;
}

export type RouteFunction = (args: RouteArgs) => Promise<Response>;

export interface RouteModule {
  loader?: RouteFunction;
  action?: RouteFunction;
}

export function methodNotAllowed(): Response {
  return Response.json({ error: 'Method not allowed' }, { status: 405 });
}

function toFetchRequest(req: ExpressRequest, signal: AbortSignal): Request {
  const url = `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`;

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      value.forEach(v => headers.append(key, v));
    } else {
      headers.set(key, value);
    }
  }

  const hasBody = req.method !== 'GET' && req.method !== 'HEAD';
  // express.text() leaves {} behind when no body was parsed
  const body = hasBody && typeof req.body === 'string' && req.body.length > 0 ? req.body : undefined;

  return new Request(url, { method: req.method, headers, body, signal });
}

async function sendFetchResponse(res: ExpressResponse, response: Response): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });

  if (response.body === null) {
    res.end();
    return;
  }

  res.send(Buffer.from(await response.arrayBuffer()));
}

export function createRequestHandler(module: RouteModule): RequestHandler {
  return (req, res, next) => {
    const isRead = req.method === 'GET' || req.method === 'HEAD';
    const fn = isRead ? module.loader : module.action;

    // Aborts when the client goes away before the response is written
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const run = async () => {
      const request = toFetchRequest(req, controller.signal);
      const response = fn ? await fn({ request, params: { ...req.params } }) : methodNotAllowed();
      await sendFetchResponse(res, response);
    };

    run().catch(next);
  };
}
