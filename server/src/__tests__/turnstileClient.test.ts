import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { TurnstileVerifier } from '../services/turnstileClient';
import {
  ChallengeFailedError,
  ConfigurationError,
  MalformedResponseError,
  TransportError,
  VerificationServiceError,
} from '../utils/errors';

const ENDPOINT = 'https://verify.test/siteverify';

function response(status: number, data: string): AxiosResponse<string> {
  return { status, statusText: '', data, headers: {}, config: { headers: new AxiosHeaders() } };
}

function setup(settings = { endpoint: ENDPOINT, secret: 'test-secret' }) {
  const client = axios.create();
  const post = vi.spyOn(client, 'post');
  const verifier = new TurnstileVerifier(settings, client);
  return { verifier, post };
}

describe('TurnstileVerifier', () => {
  it('fails with ConfigurationError and makes no request when the secret is empty', async () => {
    const { verifier, post } = setup({ endpoint: ENDPOINT, secret: '' });

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.cause).toBeInstanceOf(ConfigurationError);
    expect(post).not.toHaveBeenCalled();
  });

  it('fails with ConfigurationError when the endpoint is empty', async () => {
    const { verifier, post } = setup({ endpoint: '', secret: 'test-secret' });

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.cause.kind).toBe('configuration');
    expect(post).not.toHaveBeenCalled();
  });

  it('posts secret, token and client address and accepts success=true', async () => {
    const { verifier, post } = setup();
    post.mockResolvedValue(response(200, '{"success":true}'));

    const outcome = await verifier.verify('tok-123', '203.0.113.7');

    expect(outcome).toEqual({ success: true });
    expect(post).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledWith(
      ENDPOINT,
      { secret: 'test-secret', response: 'tok-123', remoteip: '203.0.113.7' },
      expect.objectContaining({ responseType: 'text' }),
    );
  });

  it('reports an honest challenge failure with its error codes', async () => {
    const { verifier, post } = setup();
    post.mockResolvedValue(response(200, '{"success":false,"error-codes":["invalid-input-response"]}'));

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.cause).toBeInstanceOf(ChallengeFailedError);
      expect(outcome.cause.message).toBe('challenge not passed: invalid-input-response');
    }
  });

  it('treats HTTP 500 as a service error and keeps the body for diagnostics', async () => {
    const { verifier, post } = setup();
    post.mockResolvedValue(response(500, 'upstream exploded'));

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.cause).toBeInstanceOf(VerificationServiceError);
      expect(outcome.cause.message).toBe(
        'turnstile verification failed with status: 500 Error Body: `upstream exploded`',
      );
    }
  });

  it('treats a 2xx body that is not JSON as malformed', async () => {
    const { verifier, post } = setup();
    post.mockResolvedValue(response(200, '<html>hi</html>'));

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.cause).toBeInstanceOf(MalformedResponseError);
  });

  it('treats JSON without a boolean success field as malformed', async () => {
    const { verifier, post } = setup();
    post.mockResolvedValue(response(200, '{"success":"yes"}'));

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.cause.kind).toBe('malformed_response');
  });

  it('maps network failures to TransportError instead of throwing', async () => {
    const { verifier, post } = setup();
    post.mockRejectedValue(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'));

    const outcome = await verifier.verify('tok', '203.0.113.7');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.cause).toBeInstanceOf(TransportError);
      expect(outcome.cause.message).toBe('turnstile request failed: connect ECONNREFUSED 127.0.0.1:443');
    }
  });
});
