import { UserRepository } from '../repositories/user.repository';
import { AuthService } from '../services/auth.service';
import { ServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

export const ADMIN_USAGE = [
  'Usage:',
  '  admin create-admin <email>',
  '  admin set-admin <username>',
  '  admin remove-admin <username>',
  '  admin list-admins',
].join('\n');

/** Bad invocation; the entry point prints the usage text for it. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface AdminCommandDeps {
  authService: AuthService;
  users: UserRepository;
  write: (line: string) => void;
}

const singleArgument = (args: string[], name: string): string => {
  if (args.length !== 1 || !args[0]) {
    throw new UsageError(`Expected exactly one <${name}>`);
  }
  return args[0];
};

const setAdminFlag = async (users: UserRepository, username: string, isAdmin: boolean) => {
  const user = await users.findByUsername(username);
  if (!user) {
    throw new ServiceError('UserNotFound', username);
  }
  await users.update(user.id, { isAdmin });
  logger.info(isAdmin ? 'Admin granted' : 'Admin revoked', { targetUserId: user.id, actor: 'cli' });
};

/**
 * Offline account administration against the configured store.
 * Keys are always generated; there is no way to choose one here.
 */
export async function runAdminCommand(argv: string[], deps: AdminCommandDeps): Promise<void> {
  const [command, ...args] = argv;

  switch (command) {
    case 'create-admin': {
      if (args.includes('--password')) {
        throw new UsageError('--password is not supported: keys are generated');
      }
      const email = singleArgument(args, 'email');
      const { user, key } = await deps.authService.register({ email, isAdmin: true });
      deps.write(`username: ${user.username}`);
      deps.write(`key: ${key}`);
      return;
    }

    case 'set-admin': {
      const username = singleArgument(args, 'username');
      await setAdminFlag(deps.users, username, true);
      deps.write(`${username} is now an admin`);
      return;
    }

    case 'remove-admin': {
      const username = singleArgument(args, 'username');
      await setAdminFlag(deps.users, username, false);
      deps.write(`${username} is no longer an admin`);
      return;
    }

    case 'list-admins': {
      if (args.length > 0) {
        throw new UsageError('list-admins takes no arguments');
      }
      const admins = await deps.users.list({ isAdmin: true });
      if (admins.length === 0) {
        deps.write('No admins found');
        return;
      }
      for (const admin of admins) {
        deps.write(`${admin.id}\t${admin.username}\t${admin.email}${admin.isActive ? '' : '\t(inactive)'}`);
      }
      return;
    }

    default:
      throw new UsageError(command ? `Unknown command: ${command}` : 'Missing command');
  }
}
