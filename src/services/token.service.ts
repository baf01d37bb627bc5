import { sign, verify, JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';
import { AppConfig, JwtAlgorithm } from '../config/env';

export type TokenErrorKind = 'InvalidSignature' | 'Expired' | 'Malformed';

export class TokenError extends Error {
  public readonly kind: TokenErrorKind;

  constructor(kind: TokenErrorKind, detail?: string) {
    super(detail ? `${kind}: ${detail}` : kind);
    this.name = 'TokenError';
    this.kind = kind;
  }
}

// jsonwebtoken reports these messages when the key or algorithm does not match
const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

export type Clock = () => number;

/**
 * Issues and validates self-contained access tokens (HMAC-signed JWTs).
 * Tokens bind a username in `sub` and carry their own expiry; they are not revocable.
 */
export class TokenService {
  private readonly secret: string;
  private readonly algorithm: JwtAlgorithm;

  constructor(
    config: Pick<AppConfig, 'jwt'>,
    private readonly clock: Clock = Date.now
  ) {
    this.secret = config.jwt.secret;
    this.algorithm = config.jwt.algorithm;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }

  /** Signs a token for `subject` valid for `ttlSeconds` from now. */
  public issue(subject: string, ttlSeconds: number): string {
    const iat = this.nowSeconds();
    return sign({ sub: subject, iat, exp: iat + ttlSeconds }, this.secret, {
      algorithm: this.algorithm,
    });
  }

  /**
   * Returns the token's subject.
   * A token is accepted only while `now < exp`; the signature is checked before expiry.
   * @throws {TokenError}
   */
  public validate(token: string): string {
    let decoded: unknown;
    try {
      decoded = verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error: unknown) {
      if (error instanceof TokenExpiredError) {
        throw new TokenError('Expired', error.expiredAt.toISOString());
      }
      if (error instanceof JsonWebTokenError && SIGNATURE_FAILURES.has(error.message)) {
        throw new TokenError('InvalidSignature');
      }
      throw new TokenError('Malformed', error instanceof Error ? error.message : undefined);
    }

    if (typeof decoded !== 'object' || decoded === null) {
      throw new TokenError('Malformed', 'payload is not an object');
    }
    if (!('exp' in decoded) || typeof decoded.exp !== 'number') {
      throw new TokenError('Malformed', 'missing exp claim');
    }
    if (!('sub' in decoded) || typeof decoded.sub !== 'string' || decoded.sub.length === 0) {
      throw new TokenError('Malformed', 'missing sub claim');
    }

    return decoded.sub;
  }
}
