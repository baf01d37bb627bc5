import { AppConfig } from '../config/env';
import { UserRepository } from '../repositories/user.repository';
import { User } from '../types/domain';
import { ACCOUNT_KEY_LENGTH, USERNAME_LENGTH, generateCode } from '../utils/codeGenerator';
import { ServiceError, isServiceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { PasswordHasher } from '../utils/passwordHasher';
import { TokenService } from './token.service';

const MAX_USERNAME_ATTEMPTS = 10;

// DTO for token response
export interface ITokenGrant {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number; // seconds
}

export interface IRegistration {
  user: User;
  /** Plain account key. Returned once, never stored. */
  key: string;
}

export class AuthService {
  private readonly accessTokenTtlS: number;
  private dummyHash?: Promise<string>;

  constructor(
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
    config: Pick<AppConfig, 'jwt'>
  ) {
    this.accessTokenTtlS = config.jwt.accessTokenTtlMinutes * 60;
  }

  public get tokenTtlSeconds(): number {
    return this.accessTokenTtlS;
  }

  /**
   * Registers a new account with a generated username and key.
   * Username uniqueness is left to the store; a collision re-rolls the username.
   * @throws {ServiceError} - 'EmailAlreadyExists' | 'UsernameExhausted'.
   */
  public async register(data: { email: string; isAdmin?: boolean }): Promise<IRegistration> {
    const email = data.email.trim().toLowerCase();

    // 1. Fast path for the common duplicate; the unique index still decides races
    if (await this.users.findByEmail(email)) {
      throw new ServiceError('EmailAlreadyExists');
    }

    // 2. Generate and hash the one-time key
    const key = generateCode(ACCOUNT_KEY_LENGTH);
    const hashedPassword = await this.hasher.hash(key);

    // 3. Insert, re-rolling the username on conflict
    for (let attempt = 1; attempt <= MAX_USERNAME_ATTEMPTS; attempt++) {
      const username = generateCode(USERNAME_LENGTH);
      try {
        const user = await this.users.create({
          username,
          email,
          hashedPassword,
          isAdmin: data.isAdmin ?? false,
        });
        logger.info('User registered', { userId: user.id, username: user.username });
        return { user, key };
      } catch (error: unknown) {
        if (!isServiceError(error, 'UsernameTaken')) throw error;
        logger.debug('Generated username collided, retrying', { attempt });
      }
    }

    throw new ServiceError('UsernameExhausted');
  }

  /**
   * Checks a username/key pair.
   * Unknown users and wrong keys fail identically, including in timing.
   * @throws {ServiceError} - 'InvalidCredentials' | 'AccountInactive'.
   */
  public async authenticate(username: string, password: string): Promise<User> {
    const user = await this.users.findByUsername(username);

    if (!user) {
      await this.hasher.verify(password, await this.getDummyHash());
      throw new ServiceError('InvalidCredentials');
    }

    const isMatch = await this.hasher.verify(password, user.hashedPassword);
    if (!isMatch) {
      throw new ServiceError('InvalidCredentials');
    }

    if (!user.isActive) {
      throw new ServiceError('AccountInactive');
    }

    return user;
  }

  public issueAccessToken(user: Pick<User, 'username'>): ITokenGrant {
    return {
      accessToken: this.tokens.issue(user.username, this.accessTokenTtlS),
      tokenType: 'bearer',
      expiresIn: this.accessTokenTtlS,
    };
  }

  /**
   * Authenticates and returns a fresh access token.
   * @throws {ServiceError} - 'InvalidCredentials' | 'AccountInactive'.
   */
  public async login(username: string, password: string): Promise<ITokenGrant & { user: User }> {
    const user = await this.authenticate(username, password);
    logger.info('User logged in', { userId: user.id });
    return { ...this.issueAccessToken(user), user };
  }

  /**
   * Maps a presented token to its current account.
   * The store lookup is what catches accounts deleted after the token was issued.
   * @throws {TokenError} - from TokenService.validate
   * @throws {ServiceError} - 'UserNotFound'.
   */
  public async resolveUser(token: string): Promise<User> {
    const username = this.tokens.validate(token);
    const user = await this.users.findByUsername(username);
    if (!user) {
      throw new ServiceError('UserNotFound');
    }
    return user;
  }

  /**
   * Replaces the caller's key. Tokens already issued stay valid until they expire.
   * @throws {ServiceError} - 'UserNotFound'.
   */
  public async rotateKey(userId: number): Promise<string> {
    const key = generateCode(ACCOUNT_KEY_LENGTH);
    const hashedPassword = await this.hasher.hash(key);

    const updated = await this.users.update(userId, { hashedPassword });
    if (!updated) {
      throw new ServiceError('UserNotFound');
    }

    logger.info('Account key rotated', { userId });
    return key;
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hasher.hash(generateCode(ACCOUNT_KEY_LENGTH));
    }
    return this.dummyHash;
  }
}
