// @packroom/auth — Access-token codec (stateless HS256 JWT)
import { SignJWT, jwtVerify, errors, type JWTPayload } from 'jose';
import { AuthError } from './errors.js';
import { systemClock, type Clock, type SecretProvider } from './types.js';

// ── Access-token claims ──────────────────────────────────────────────
export interface AccessTokenClaims extends JWTPayload {
  sub: string;
  authorized: true;
  exp: number;
}

/** Only the HMAC family is accepted on verify; anything else is an alg downgrade. */
export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
const SIGNING_ALGORITHM = 'HS256';

export interface AccessTokenCodecOptions {
  lifetimeSeconds: number;
  clock?: Clock;
}

export class AccessTokenCodec {
  private readonly clock: Clock;
  readonly lifetimeSeconds: number;

  constructor(
    private readonly secret: SecretProvider,
    options: AccessTokenCodecOptions,
  ) {
    if (!Number.isFinite(options.lifetimeSeconds) || options.lifetimeSeconds <= 0) {
      throw new RangeError('Access-token lifetime must be a positive number of seconds');
    }
    this.lifetimeSeconds = options.lifetimeSeconds;
    this.clock = options.clock ?? systemClock;
  }

  private key(): Uint8Array {
    return new TextEncoder().encode(this.secret());
  }

  async mint(subjectId: number): Promise<string> {
    const now = Math.floor(this.clock() / 1000);
    return new SignJWT({ authorized: true })
      .setProtectedHeader({ alg: SIGNING_ALGORITHM, typ: 'JWT' })
      .setSubject(String(subjectId))
      .setIssuedAt(now)
      .setExpirationTime(now + this.lifetimeSeconds)
      .sign(this.key());
  }

  /**
   * Verify signature, algorithm family and expiry. Returns the claims.
   * Throws AuthError `token_expired` or `token_invalid`.
   */
  async verify(token: string): Promise<AccessTokenClaims> {
    try {
      const { payload } = await jwtVerify(token, this.key(), {
        algorithms: [...HMAC_ALGORITHMS],
        currentDate: new Date(this.clock()),
        requiredClaims: ['exp', 'sub'],
      });
      if (typeof payload.sub !== 'string' || typeof payload.exp !== 'number') {
        throw new AuthError('token_invalid', 'Token is missing required claims');
      }
      return { ...payload, sub: payload.sub, exp: payload.exp, authorized: true };
    } catch (err) {
      if (err instanceof AuthError) throw err;
      if (err instanceof errors.JWTExpired) {
        throw new AuthError('token_expired', 'Token has expired');
      }
      throw new AuthError('token_invalid', 'Token is invalid');
    }
  }

  /**
   * Verified subject id. Absent, malformed, unverifiable or expired tokens throw.
   */
  async extractSubjectId(token: string | undefined): Promise<number> {
    if (!token) {
      throw new AuthError('token_invalid', 'No token provided');
    }
    const claims = await this.verify(token);
    const id = Number(claims.sub);
    if (!Number.isSafeInteger(id) || id <= 0) {
      throw new AuthError('token_invalid', 'Token subject is not an account id');
    }
    return id;
  }
}
