import { z } from 'zod';
import { AuthFailedError, AuthFailureKind, RequestRejectedError } from '../../errors';
import { authenticate2FAReplySchema, authenticateUserReplySchema } from '../../feeds';
import { totp } from '../../totp';
import { AuthState, Credentials } from '../../types';

/**
 * Sends one request on the current connection and resolves with the reply payload.
 */
export type AuthRequest = (endpoint: string, payload: unknown) => Promise<unknown>;

/**
 * Session issued by a successful login.
 */
export interface AuthSession {
  sessionToken: string;
  userId: number | null;
}

/**
 * Authenticator configuration options
 */
export interface AuthenticatorOptions {
  credentials: Credentials;
  /** Clock used for one-time codes (default: Date.now) */
  now?: () => number;
  /** Debug sink; never receives secrets */
  log?: (message: string) => void;
}

/** Rejection reasons that point at the local clock rather than a wrong secret */
const CLOCK_SKEW_PATTERN = /\b(time|clock|skew|expired?|sync)/i;

/**
 * Drives the two-step login on one connection.
 *
 * @remarks
 * `AuthenticateUser` is answered either with a session directly or with a
 * `Requires2FA` challenge, which is met with a time-based code sent as
 * `Authenticate2FA`. Every rejection ends in `AuthFailed` with an
 * {@link AuthFailedError}; transport failures propagate unchanged so the caller
 * can retry the connection.
 *
 * A code rejected twice in a row, across connections, is reported as `clock-skew`.
 */
export class Authenticator {
  private current: AuthState = 'Disconnected';
  private session: AuthSession | null = null;
  private consecutiveCodeRejections: number = 0;
  private readonly credentials: Credentials;
  private readonly now: () => number;
  private readonly log: (message: string) => void;

  constructor(options: AuthenticatorOptions) {
    this.credentials = options.credentials;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? (() => undefined);
  }

  get state(): AuthState {
    return this.current;
  }

  get currentSession(): AuthSession | null {
    return this.session;
  }

  /**
   * A transport is being opened.
   */
  markConnecting(): void {
    this.current = 'Connecting';
    this.session = null;
  }

  /**
   * The connection is gone; the session token no longer applies.
   */
  reset(): void {
    this.current = 'Disconnected';
    this.session = null;
  }

  /**
   * Runs the login handshake.
   *
   * @throws {AuthFailedError} If the gateway rejects the login or the code, or answers unintelligibly
   */
  async authenticate(request: AuthRequest): Promise<AuthSession> {
    this.current = 'AwaitingChallenge';
    this.session = null;
    this.log('Authenticating');

    let raw: unknown;
    try {
      raw = await request('AuthenticateUser', {
        UserName: this.credentials.username,
        Password: this.credentials.password,
      });
    } catch (error) {
      if (error instanceof RequestRejectedError) {
        throw this.fail('credentials', error.message);
      }
      throw error;
    }

    const reply = this.parse(authenticateUserReplySchema, raw, 'AuthenticateUser');
    if (reply.Authenticated) {
      return this.complete(reply.SessionToken, reply.UserId ?? reply.User?.UserId);
    }
    if (!reply.Requires2FA) {
      throw this.fail('credentials', reply.errormsg || 'Invalid username or password');
    }

    return this.answerChallenge(request);
  }

  private async answerChallenge(request: AuthRequest): Promise<AuthSession> {
    this.current = 'AwaitingSecondFactor';

    let code: string;
    try {
      code = totp(this.credentials.twoFactorSecret, this.now());
    } catch (error) {
      throw this.fail('second-factor', `Unusable two-factor secret: ${error instanceof Error ? error.message : String(error)}`);
    }

    this.log('Second factor requested, sending code');
    let raw: unknown;
    try {
      raw = await request('Authenticate2FA', { Code: code });
    } catch (error) {
      if (error instanceof RequestRejectedError) {
        throw this.codeRejected(error.message);
      }
      throw error;
    }

    const reply = this.parse(authenticate2FAReplySchema, raw, 'Authenticate2FA');
    if (!reply.Authenticated) {
      throw this.codeRejected(reply.errormsg || 'Code rejected');
    }
    return this.complete(reply.SessionToken, reply.UserId);
  }

  private complete(sessionToken: string | null | undefined, userId: number | null | undefined): AuthSession {
    if (!sessionToken) {
      throw this.fail('protocol', 'Authenticated reply carries no session token');
    }
    this.session = { sessionToken, userId: userId ?? null };
    this.current = 'Authenticated';
    this.consecutiveCodeRejections = 0;
    this.log(`Authenticated${userId != null ? ` as user ${userId}` : ''}`);
    return this.session;
  }

  private codeRejected(reason: string): AuthFailedError {
    this.consecutiveCodeRejections++;
    const kind: AuthFailureKind =
      CLOCK_SKEW_PATTERN.test(reason) || this.consecutiveCodeRejections >= 2 ? 'clock-skew' : 'second-factor';
    return this.fail(kind, reason);
  }

  private parse<T extends z.ZodTypeAny>(schema: T, raw: unknown, endpoint: string): z.output<T> {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw this.fail('protocol', `Unexpected ${endpoint} reply: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }

  private fail(kind: AuthFailureKind, reason: string): AuthFailedError {
    this.current = 'AuthFailed';
    this.session = null;
    this.log(`Authentication failed (${kind})`);
    return new AuthFailedError(kind, reason);
  }
}
