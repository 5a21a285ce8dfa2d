import express, { Router, Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { clientIdentity } from '../middleware/clientIdentity';
import { submissionsTotal } from '../utils/metrics';
import { sanitizePayload } from '../utils/sanitize';
import { submissionSchema, describeIssues, SubmissionRequest } from '../utils/validation';
import { TransportError } from '../utils/errors';
import { Mailer } from '../services/mailer';
import { Verifier, VerificationOutcome } from '../services/turnstileClient';

export const GENERIC_REJECTION = 'invalid request';
export const SUBMISSION_SUBJECT = 'New CTA Submission';
export const BOT_USER_AGENT_MARKERS = ['curl/', 'python-requests', 'bot'];

/** Terminal states of a submission, in pipeline order. */
export type SubmissionState =
  | 'ua_rejected'
  | 'rate_limited'
  | 'body_too_large'
  | 'bad_payload'
  | 'missing_token'
  | 'unverified_token'
  | 'delivery_failed'
  | 'accepted';

const STATUS_BY_STATE: Record<SubmissionState, number> = {
  ua_rejected: 400,
  rate_limited: 429,
  body_too_large: 400,
  bad_payload: 400,
  missing_token: 400,
  unverified_token: 400,
  delivery_failed: 500,
  accepted: 204,
};

type GuardResult = { ok: true } | { ok: false; state: SubmissionState; reason: string };

const PASS: GuardResult = { ok: true };

function refuse(state: SubmissionState, reason: string): GuardResult {
  return { ok: false, state, reason };
}

export interface RateLimiter {
  admit(identity: string): boolean;
}

export interface SubmissionRouterDeps {
  /** Mount path of the endpoint, e.g. `/-/cta`. */
  path: string;
  blockBotUserAgents: boolean;
  maxBodySize: number;
  rateLimiter: RateLimiter;
  verifier: Verifier;
  mailer: Mailer;
}

export function isFakeUserAgent(userAgent: string | undefined): boolean {
  if (!userAgent) return true;
  const ua = userAgent.toLowerCase();
  return BOT_USER_AGENT_MARKERS.some((marker) => ua.includes(marker));
}

/**
 * Every client-side rejection gets the same status-appropriate generic body.
 * The actual reason only goes to the operator log.
 */
function reject(req: Request, res: Response, state: SubmissionState, reason: string) {
  logger.warn({ ip: req.clientIdentity, path: req.path, reason }, 'refused submit');
  submissionsTotal.inc({ outcome: state });
  res.status(STATUS_BY_STATE[state]).type('text/plain').send(GENERIC_REJECTION);
}

/** Wrap a synchronous check as middleware. */
function guard(check: (req: Request) => GuardResult) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = check(req);
    if (!result.ok) return reject(req, res, result.state, result.reason);
    next();
  };
}

function bodyErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

/**
 * Form submission endpoint.
 *
 * Checks run strictly in this order and the first failure ends the request:
 * user agent → rate limit → body size → JSON shape → token present →
 * challenge verified → mail delivered.
 */
export function createSubmissionRouter(deps: SubmissionRouterDeps): Router {
  const router = Router();

  const checkUserAgent = guard((req) => {
    if (!deps.blockBotUserAgents) return PASS;
    return isFakeUserAgent(req.get('user-agent')) ? refuse('ua_rejected', 'fake user agent') : PASS;
  });

  const checkRate = guard((req) =>
    deps.rateLimiter.admit(req.clientIdentity || 'unknown') ? PASS : refuse('rate_limited', 'rate limit'),
  );

  // Any content type is decoded as JSON. The parser rejects a declared
  // Content-Length over the limit up front and aborts once the bytes read
  // exceed it.
  const readBody = express.json({ limit: deps.maxBodySize, type: () => true });

  const bodyErrors = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const type = bodyErrorType(err);
    if (!type) return next(err);
    if (type === 'entity.too.large') return reject(req, res, 'body_too_large', 'content-length too large');
    const message = err instanceof Error ? err.message : type;
    return reject(req, res, 'bad_payload', `bad json: ${message}`);
  };

  const handleSubmission = async (req: Request, res: Response) => {
    const parsed = submissionSchema.safeParse(req.body);
    if (!parsed.success) {
      return reject(req, res, 'bad_payload', `bad json: ${describeIssues(parsed.error)}`);
    }

    const { token, payload }: SubmissionRequest = parsed.data;
    if (!token) {
      return reject(req, res, 'missing_token', 'missing token');
    }

    const identity = req.clientIdentity || 'unknown';
    let outcome: VerificationOutcome;
    try {
      outcome = await deps.verifier.verify(token, identity);
    } catch (err) {
      outcome = { success: false, cause: new TransportError('verifier threw', { cause: err }) };
    }
    if (!outcome.success) {
      return reject(req, res, 'unverified_token', `turnstile failed: ${outcome.cause.message}`);
    }

    try {
      await deps.mailer.deliver(SUBMISSION_SUBJECT, sanitizePayload(payload));
    } catch (err) {
      logger.error({ err, ip: identity, path: req.path }, 'send mail failed');
      submissionsTotal.inc({ outcome: 'delivery_failed' });
      return res.status(STATUS_BY_STATE.delivery_failed).type('text/plain').send(GENERIC_REJECTION);
    }

    submissionsTotal.inc({ outcome: 'accepted' });
    res.status(STATUS_BY_STATE.accepted).end();
  };

  const submit = (req: Request, res: Response, next: NextFunction) => {
    handleSubmission(req, res).catch(next);
  };

  router.post(deps.path, clientIdentity, checkUserAgent, checkRate, readBody, bodyErrors, submit);

  return router;
}
