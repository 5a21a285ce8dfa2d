/**
 * Error types shared across the server.
 *
 * None of these messages are ever sent to a client: the submission endpoint
 * answers every rejection with the same generic body, and the detail below
 * only reaches the operator log.
 */

export class AppError extends Error {
  constructor(message: string, public readonly status: number = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Invalid or incomplete configuration file. Fatal at startup. */
export class ConfigError extends AppError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ─── Challenge verification ───

export type VerificationErrorKind =
  | 'configuration'
  | 'transport'
  | 'service'
  | 'malformed_response'
  | 'challenge_failed';

export abstract class VerificationError extends AppError {
  abstract readonly kind: VerificationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
  }
}

/** Secret or endpoint missing: verification cannot run at all. */
export class ConfigurationError extends VerificationError {
  readonly kind = 'configuration';

  constructor(message = 'turnstile not configured') {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** DNS, connection or timeout failure talking to the verification service. */
export class TransportError extends VerificationError {
  readonly kind = 'transport';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** Verification service answered outside 2xx. */
export class VerificationServiceError extends VerificationError {
  readonly kind = 'service';

  constructor(public readonly statusCode: number, public readonly responseBody: string) {
    super(`turnstile verification failed with status: ${statusCode} Error Body: \`${responseBody}\``);
    this.name = 'VerificationServiceError';
  }
}

/** 2xx answer whose body could not be read as `{ success: boolean }`. */
export class MalformedResponseError extends VerificationError {
  readonly kind = 'malformed_response';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/** The service worked and said the token is not valid. */
export class ChallengeFailedError extends VerificationError {
  readonly kind = 'challenge_failed';

  constructor(public readonly errorCodes: string[] = []) {
    super(
      errorCodes.length > 0
        ? `challenge not passed: ${errorCodes.join(', ')}`
        : 'challenge not passed',
    );
    this.name = 'ChallengeFailedError';
  }
}

// ─── Mail delivery ───

export class DeliveryError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
    this.name = 'DeliveryError';
  }
}
