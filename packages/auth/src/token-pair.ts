// @packroom/auth — Login / refresh / logout over an access + refresh token pair
import { AuthError, MalformedHashError, NotFoundError, PasswordMismatchError } from './errors.js';
import type { AccessTokenCodec } from './jwt.js';
import { hashPassword, verifyPassword } from './passwords.js';
import {
  refreshTokenLifetimeSeconds,
  type RefreshTokenRecord,
  type RefreshTokenStore,
} from './refresh-tokens.js';
import {
  systemClock,
  type AccountStatus,
  type Clock,
  type QueryOptions,
  type RefreshResult,
  type TokenLifetimePolicy,
  type TokenPair,
} from './types.js';

// ── Credential adapter — caller injects this ─────────────────────────
export interface StoredCredential {
  accountId: number;
  passwordHash: string;
  status: AccountStatus;
}

export interface CredentialLookup {
  /** Resolves null when no account has this username. */
  findByUsername(username: string, opts?: QueryOptions): Promise<StoredCredential | null>;
}

export interface TokenPairServiceOptions {
  credentials: CredentialLookup;
  refreshTokens: RefreshTokenStore;
  codec: AccessTokenCodec;
  policy: TokenLifetimePolicy;
  clock?: Clock;
  /** Called when the best-effort last_used_at update fails. */
  onTouchError?: (err: unknown, refreshTokenId: number) => void;
}

const INVALID_CREDENTIALS = 'Invalid username or password';

let decoyHash: Promise<string> | undefined;

/**
 * Unknown usernames still pay for one hash verification so that response
 * time does not tell them apart from a wrong password.
 */
async function verifyAgainstDecoy(password: string): Promise<void> {
  decoyHash ??= hashPassword('decoy-password-never-matches');
  try {
    await verifyPassword(password, await decoyHash);
  } catch (err) {
    if (!(err instanceof PasswordMismatchError)) throw err;
  }
}

export class TokenPairService {
  private readonly clock: Clock;

  constructor(private readonly opts: TokenPairServiceOptions) {
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Check credentials and issue an access + refresh token pair.
   *
   * @throws AuthError `invalid_credentials` for an unknown user or a wrong password
   * @throws AuthError `pending_activation` when the account is not active
   */
  async login(
    username: string,
    password: string,
    rememberMe: boolean,
    queryOpts?: QueryOptions,
  ): Promise<TokenPair> {
    const credential = await this.opts.credentials.findByUsername(username, queryOpts);
    if (!credential) {
      await verifyAgainstDecoy(password);
      throw new AuthError('invalid_credentials', INVALID_CREDENTIALS);
    }

    try {
      await verifyPassword(password, credential.passwordHash);
    } catch (err) {
      if (err instanceof PasswordMismatchError || err instanceof MalformedHashError) {
        throw new AuthError('invalid_credentials', INVALID_CREDENTIALS, credential.accountId);
      }
      throw err;
    }

    if (credential.status !== 'active') {
      throw new AuthError('pending_activation', 'Account not yet confirmed', credential.accountId);
    }

    const accessToken = await this.opts.codec.mint(credential.accountId);
    const refresh = await this.opts.refreshTokens.create(credential.accountId, rememberMe, queryOpts);

    return {
      token: accessToken,
      accessToken,
      refreshToken: refresh.token,
      accessExpiresIn: this.opts.codec.lifetimeSeconds,
      refreshExpiresIn: refreshTokenLifetimeSeconds(rememberMe, this.opts.policy),
      accountId: credential.accountId,
    };
  }

  /**
   * Mint a new access token from a refresh token. The refresh token is not
   * rotated: the same value stays valid until it expires or is revoked.
   */
  async refresh(refreshToken: string, queryOpts?: QueryOptions): Promise<RefreshResult> {
    let record: RefreshTokenRecord;
    try {
      record = await this.opts.refreshTokens.get(refreshToken, queryOpts);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new AuthError('token_invalid', 'Invalid refresh token');
      }
      throw err;
    }

    if (record.revoked) {
      throw new AuthError('token_revoked', 'Refresh token has been revoked', record.accountId);
    }
    if (this.clock() >= record.expiresAt.getTime()) {
      throw new AuthError('token_expired', 'Refresh token has expired', record.accountId);
    }

    const accessToken = await this.opts.codec.mint(record.accountId);

    const tokenId = record.id;
    void this.opts.refreshTokens.touch(tokenId, queryOpts).catch((err: unknown) => {
      this.opts.onTouchError?.(err, tokenId);
    });

    return {
      accessToken,
      expiresIn: this.opts.codec.lifetimeSeconds,
      accountId: record.accountId,
    };
  }

  /**
   * Revoke a refresh token. Resolves with the owning account id when it
   * could be read before deletion.
   *
   * @throws NotFoundError when the token does not exist (including a second logout)
   */
  async logout(refreshToken: string, queryOpts?: QueryOptions): Promise<number | null> {
    let accountId: number | null = null;
    try {
      accountId = (await this.opts.refreshTokens.get(refreshToken, queryOpts)).accountId;
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }
    await this.opts.refreshTokens.revoke(refreshToken, queryOpts);
    return accountId;
  }
}
