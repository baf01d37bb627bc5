import { connectDatabase, disconnectDatabase } from '../config/database';
import { ConfigError, loadConfigFromEnvironment } from '../config/env';
import { MongoUserRepository } from '../repositories/user.repository';
import { AuthService } from '../services/auth.service';
import { TokenService } from '../services/token.service';
import { describeError, isServiceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { PasswordHasher } from '../utils/passwordHasher';
import { ADMIN_USAGE, UsageError, runAdminCommand } from './adminCommands';

// npm run admin -- <command> [argument]
async function main(argv: string[]): Promise<void> {
  const config = loadConfigFromEnvironment();
  logger.setLevel(config.logLevel);
  await connectDatabase(config);

  try {
    const users = new MongoUserRepository();
    const authService = new AuthService(
      users,
      new PasswordHasher(config.bcryptRounds),
      new TokenService(config),
      config
    );
    await runAdminCommand(argv, {
      authService,
      users,
      write: line => process.stdout.write(`${line}\n`),
    });
  } finally {
    await disconnectDatabase();
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof UsageError) {
    process.stderr.write(`${error.message}\n${ADMIN_USAGE}\n`);
  } else if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { problems: error.problems });
  } else if (isServiceError(error, 'EmailAlreadyExists')) {
    logger.error('An account with this email already exists');
  } else if (isServiceError(error, 'UserNotFound')) {
    logger.error('No user with this username', { error: error.message });
  } else {
    logger.error('Admin command failed', { error: describeError(error) });
  }
  process.exit(1);
});
