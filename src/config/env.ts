import dotenv from 'dotenv';
import { LOG_LEVELS, LogLevel, isLogLevel } from '../utils/logger';

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ['HS256', 'HS384', 'HS512'];
const MIN_SECRET_LENGTH = 32;

export interface AppConfig {
  readonly nodeEnv: string;
  readonly port: number;
  readonly mongodbUri: string;
  readonly dbTimeoutMs: number;
  readonly jwt: {
    readonly secret: string;
    readonly algorithm: JwtAlgorithm;
    readonly accessTokenTtlMinutes: number;
  };
  readonly uploadDir: string;
  readonly maxUploadBytes: number;
  readonly bcryptRounds: number;
  readonly logLevel: LogLevel;
}

/** Raised at startup when the environment cannot produce a usable configuration. */
export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

type EnvSource = Record<string, string | undefined>;

const isJwtAlgorithm = (value: string): value is JwtAlgorithm =>
  JWT_ALGORITHMS.some(alg => alg === value);

/**
 * Builds the immutable application configuration from an environment map.
 * Every problem is collected before throwing so a bad deployment is reported in one pass.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const problems: string[] = [];

  const required = (key: string): string => {
    const value = source[key]?.trim();
    if (!value) {
      problems.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  };

  const integer = (key: string, fallback: number, min: number, max: number): number => {
    const raw = source[key]?.trim();
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      problems.push(`${key} must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return parsed;
  };

  const mongodbUri = required('MONGODB_URI');
  const uploadDir = required('UPLOAD_DIR');

  const secret = required('JWT_SECRET');
  if (secret && secret.length < MIN_SECRET_LENGTH) {
    problems.push(`JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters`);
  }

  const algorithmRaw = required('JWT_ALGORITHM');
  let algorithm: JwtAlgorithm = 'HS256';
  if (algorithmRaw) {
    if (isJwtAlgorithm(algorithmRaw)) {
      algorithm = algorithmRaw;
    } else {
      problems.push(`JWT_ALGORITHM must be one of ${JWT_ALGORITHMS.join(', ')}`);
    }
  }

  let accessTokenTtlMinutes = 0;
  if (required('ACCESS_TOKEN_EXPIRE_MINUTES')) {
    accessTokenTtlMinutes = integer('ACCESS_TOKEN_EXPIRE_MINUTES', 0, 1, 60 * 24 * 30);
  }

  const logLevelRaw = source.LOG_LEVEL?.trim().toLowerCase();
  let logLevel: LogLevel = 'info';
  if (logLevelRaw) {
    if (isLogLevel(logLevelRaw)) {
      logLevel = logLevelRaw;
    } else {
      problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
  }

  const config: AppConfig = {
    nodeEnv: source.NODE_ENV || 'development',
    port: integer('PORT', 5000, 1, 65535),
    mongodbUri,
    dbTimeoutMs: integer('DB_TIMEOUT_MS', 5000, 100, 120000),
    jwt: { secret, algorithm, accessTokenTtlMinutes },
    uploadDir,
    maxUploadBytes: integer('MAX_UPLOAD_BYTES', 25 * 1024 * 1024, 1, 1024 * 1024 * 1024),
    bcryptRounds: integer('BCRYPT_ROUNDS', 12, 4, 15),
    logLevel,
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return Object.freeze({ ...config, jwt: Object.freeze({ ...config.jwt }) });
}

/** Loads `.env` (if present) into process.env and builds the configuration from it. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
