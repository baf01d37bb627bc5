import { UsageError, runAdminCommand } from '../../src/scripts/adminCommands';
import { AuthService } from '../../src/services/auth.service';
import { TokenService } from '../../src/services/token.service';
import { PasswordHasher } from '../../src/utils/passwordHasher';
import { InMemoryUserRepository } from '../helpers/inMemoryStores';
import { testConfig } from '../helpers/testApp';

describe('admin commands', () => {
  const config = testConfig();
  let users: InMemoryUserRepository;
  let authService: AuthService;
  let output: string[];

  const run = (...argv: string[]) =>
    runAdminCommand(argv, { authService, users, write: line => output.push(line) });

  beforeEach(() => {
    users = new InMemoryUserRepository();
    authService = new AuthService(
      users,
      new PasswordHasher(config.bcryptRounds),
      new TokenService(config),
      config
    );
    output = [];
  });

  describe('create-admin', () => {
    it('registers an admin and prints the generated credentials', async () => {
      await run('create-admin', 'root@example.com');

      const [admin] = await users.list({ isAdmin: true });
      expect(admin.email).toBe('root@example.com');
      expect(output).toHaveLength(2);
      expect(output[0]).toBe(`username: ${admin.username}`);
      expect(output[1]).toMatch(/^key: [A-Z0-9]{10}$/);

      const key = output[1].slice('key: '.length);
      await expect(authService.authenticate(admin.username, key)).resolves.toMatchObject({ isAdmin: true });
    });

    it('refuses a chosen password', async () => {
      await expect(run('create-admin', 'root@example.com', '--password')).rejects.toBeInstanceOf(UsageError);
      expect(await users.list()).toEqual([]);
    });

    it('needs an email', async () => {
      await expect(run('create-admin')).rejects.toThrow('Expected exactly one <email>');
    });
  });

  describe('set-admin / remove-admin', () => {
    it('toggles the admin flag by username', async () => {
      const { user } = await authService.register({ email: 'user@example.com' });

      await run('set-admin', user.username);
      expect((await users.findById(user.id))?.isAdmin).toBe(true);
      expect(output).toEqual([`${user.username} is now an admin`]);

      await run('remove-admin', user.username);
      expect((await users.findById(user.id))?.isAdmin).toBe(false);
      expect(output[1]).toBe(`${user.username} is no longer an admin`);
    });

    it('reports an unknown username', async () => {
      await expect(run('set-admin', 'NOBODY')).rejects.toMatchObject({ code: 'UserNotFound' });
      await expect(run('remove-admin', 'NOBODY')).rejects.toMatchObject({ code: 'UserNotFound' });
    });
  });

  describe('list-admins', () => {
    it('prints one line per admin', async () => {
      const { user: first } = await authService.register({ email: 'a@example.com', isAdmin: true });
      await authService.register({ email: 'b@example.com' });
      const { user: third } = await authService.register({ email: 'c@example.com', isAdmin: true });
      await users.update(third.id, { isActive: false });

      await run('list-admins');

      expect(output).toEqual([
        `1\t${first.username}\ta@example.com`,
        `3\t${third.username}\tc@example.com\t(inactive)`,
      ]);
    });

    it('says so when there are none', async () => {
      await run('list-admins');
      expect(output).toEqual(['No admins found']);
    });
  });

  it('rejects unknown and missing commands', async () => {
    await expect(run('drop-everything')).rejects.toThrow('Unknown command: drop-everything');
    await expect(run()).rejects.toThrow('Missing command');
  });
});
