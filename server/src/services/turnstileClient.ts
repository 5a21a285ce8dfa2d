import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  ChallengeFailedError,
  ConfigurationError,
  MalformedResponseError,
  TransportError,
  VerificationError,
  VerificationServiceError,
} from '../utils/errors';

// ─── Types ───

export type VerificationOutcome =
  | { success: true }
  | { success: false; cause: VerificationError };

/** Anything that can decide whether a challenge token is genuine. */
export interface Verifier {
  verify(token: string, clientIdentity: string): Promise<VerificationOutcome>;
}

export interface TurnstileSettings {
  endpoint: string;
  secret: string;
  timeoutMs?: number;
}

const siteverifyResponseSchema = z.object({
  success: z.boolean(),
  'error-codes': z.array(z.string()).optional(),
});

// ─── Turnstile client ───

/**
 * Cloudflare Turnstile siteverify client.
 *
 * Fails closed: every transport or protocol anomaly comes back as
 * `{ success: false, cause }`, never as a thrown error. One attempt per call,
 * no retries.
 */
export class TurnstileVerifier implements Verifier {
  private client: AxiosInstance;

  constructor(private readonly settings: TurnstileSettings, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        timeout: settings.timeoutMs ?? 10_000,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async verify(token: string, clientIdentity: string): Promise<VerificationOutcome> {
    const { endpoint, secret } = this.settings;
    if (!secret || !endpoint) {
      return { success: false, cause: new ConfigurationError() };
    }

    let status: number;
    let body: string;
    try {
      const res = await this.client.post<string>(
        endpoint,
        { secret, response: token, remoteip: clientIdentity },
        {
          // Keep the raw body and judge the status ourselves
          responseType: 'text',
          transformResponse: (data: unknown) => data,
          validateStatus: () => true,
        },
      );
      status = res.status;
      body = typeof res.data === 'string' ? res.data : String(res.data ?? '');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, cause: new TransportError(`turnstile request failed: ${message}`, { cause: err }) };
    }

    if (status < 200 || status > 299) {
      return { success: false, cause: new VerificationServiceError(status, body) };
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (err) {
      return {
        success: false,
        cause: new MalformedResponseError('turnstile response is not valid JSON', { cause: err }),
      };
    }

    const parsed = siteverifyResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      return {
        success: false,
        cause: new MalformedResponseError('turnstile response has no boolean "success" field'),
      };
    }

    if (!parsed.data.success) {
      return { success: false, cause: new ChallengeFailedError(parsed.data['error-codes']) };
    }
    return { success: true };
  }
}
