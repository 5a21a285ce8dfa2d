import { Request, Response, NextFunction } from 'express';
import { IncomingHttpHeaders } from 'http';

declare global {
  namespace Express {
    interface Request {
      /** Best-effort client address, used as the rate-limit key. */
      clientIdentity?: string;
    }
  }
}

/**
 * First X-Forwarded-For entry, else the socket peer address.
 * The header is trusted as-is: without a trusted proxy in front, clients can
 * spoof it and pick their own rate-limit key.
 */
export function resolveClientIdentity(req: {
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string };
}): string {
  const forwarded = req.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (header) {
    const first = header.split(',')[0].trim();
    if (first) return first;
  }
  return req.socket.remoteAddress || 'unknown';
}

export function clientIdentity(req: Request, _res: Response, next: NextFunction) {
  req.clientIdentity = resolveClientIdentity(req);
  next();
}
