import { sign } from 'jsonwebtoken';
import { TokenError, TokenService } from '../../src/services/token.service';
import { TEST_SECRET } from '../helpers/testApp';

const jwtConfig = (secret: string = TEST_SECRET) => ({
  jwt: { secret, algorithm: 'HS256' as const, accessTokenTtlMinutes: 30 },
});

const kindOf = (fn: () => unknown): string => {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof TokenError) return error.kind;
    throw error;
  }
  return 'valid';
};

describe('TokenService', () => {
  const start = 1_700_000_000_000;
  let now: number;
  let tokens: TokenService;

  beforeEach(() => {
    now = start;
    tokens = new TokenService(jwtConfig(), () => now);
  });

  it('returns the subject of a fresh token', () => {
    const token = tokens.issue('ALICE1', 60);
    expect(tokens.validate(token)).toBe('ALICE1');
  });

  it('treats a zero TTL as already expired', () => {
    const token = tokens.issue('ALICE1', 0);
    expect(kindOf(() => tokens.validate(token))).toBe('Expired');
  });

  it('accepts a token until the second before exp and rejects it at and after exp', () => {
    const token = tokens.issue('ALICE1', 60);

    now = start + 59_000;
    expect(kindOf(() => tokens.validate(token))).toBe('valid');

    now = start + 60_000;
    expect(kindOf(() => tokens.validate(token))).toBe('Expired');

    now = start + 3_600_000;
    expect(kindOf(() => tokens.validate(token))).toBe('Expired');
  });

  it('reports a token signed with another key as an invalid signature, even when expired', () => {
    const foreign = new TokenService(jwtConfig('another-secret-another-secret-1234'), () => now);
    const live = foreign.issue('ALICE1', 60);
    const expired = foreign.issue('ALICE1', 0);

    expect(kindOf(() => tokens.validate(live))).toBe('InvalidSignature');
    expect(kindOf(() => tokens.validate(expired))).toBe('InvalidSignature');
  });

  it('rejects a token signed with a different HMAC algorithm', () => {
    const other = new TokenService(
      { jwt: { secret: TEST_SECRET, algorithm: 'HS512', accessTokenTtlMinutes: 30 } },
      () => now
    );
    expect(kindOf(() => tokens.validate(other.issue('ALICE1', 60)))).toBe('InvalidSignature');
  });

  it('reports garbage as malformed', () => {
    expect(kindOf(() => tokens.validate('not-a-jwt'))).toBe('Malformed');
    expect(kindOf(() => tokens.validate('a.b.c'))).toBe('Malformed');
  });

  it('reports a correctly signed token without a subject as malformed', () => {
    const iat = Math.floor(start / 1000);
    const noSub = sign({ iat, exp: iat + 60 }, TEST_SECRET, { algorithm: 'HS256' });
    const emptySub = sign({ sub: '', iat, exp: iat + 60 }, TEST_SECRET, { algorithm: 'HS256' });

    expect(kindOf(() => tokens.validate(noSub))).toBe('Malformed');
    expect(kindOf(() => tokens.validate(emptySub))).toBe('Malformed');
  });

  it('reports a correctly signed token without an expiry as malformed', () => {
    const noExp = sign({ sub: 'ALICE1' }, TEST_SECRET, { algorithm: 'HS256', noTimestamp: true });
    expect(kindOf(() => tokens.validate(noExp))).toBe('Malformed');
  });
});
