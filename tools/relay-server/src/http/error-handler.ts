import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { type RelayErrorCode, toRelayError } from 'keyrelay-core';

const STATUS_BY_CODE: Record<RelayErrorCode, number> = {
  NOT_FOUND: 404,
  STALE_VERSION: 409,
  EXPIRED: 410,
  INVALID_PAYLOAD: 400,
  CONNECTION_CLOSED: 409,
  INTERNAL: 500,
};

export function statusFor(code: RelayErrorCode): number {
  return STATUS_BY_CODE[code];
}

/** Errors raised by express.json() (malformed JSON, body too large) */
interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  if (!(err instanceof Error) || !('status' in err) || !('type' in err)) return false;
  return typeof err.status === 'number' && err.status >= 400 && err.status < 500 && typeof err.type === 'string';
}

/** Run an async route handler, forwarding rejections to the error middleware */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `no route for ${req.method} ${req.path}`, code: 'NOT_FOUND' });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParserError(err)) {
    res.status(err.status).json({ error: err.message, code: 'INVALID_PAYLOAD' });
    return;
  }

  const relayError = toRelayError(err);
  if (relayError.code === 'INTERNAL') {
    console.error(`[RelayServer] ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: 'internal server error', code: 'INTERNAL' });
    return;
  }
  res.status(statusFor(relayError.code)).json({ error: relayError.message, code: relayError.code });
}
