import { AdminService } from '../../src/services/admin.service';
import { FileService } from '../../src/services/file.service';
import { User } from '../../src/types/domain';
import {
  InMemoryBlobStore,
  InMemoryFileRepository,
  InMemoryUserRepository,
} from '../helpers/inMemoryStores';

describe('AdminService', () => {
  let users: InMemoryUserRepository;
  let files: InMemoryFileRepository;
  let blobs: InMemoryBlobStore;
  let adminService: AdminService;
  let fileService: FileService;
  let admin: User;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    users = new InMemoryUserRepository();
    files = new InMemoryFileRepository();
    blobs = new InMemoryBlobStore();
    adminService = new AdminService(users, files, blobs);
    fileService = new FileService(files, users, blobs);
    admin = await users.create({ username: 'ADMIN1', email: 'admin@example.com', hashedPassword: 'x', isAdmin: true });
    alice = await users.create({ username: 'ALICE1', email: 'alice@example.com', hashedPassword: 'x' });
    bob = await users.create({ username: 'BOBBY1', email: 'bob@example.com', hashedPassword: 'x' });
  });

  const upload = (owner: User, recipientUsername?: string) =>
    fileService.upload(owner, {
      originalName: 'notes.txt',
      mimeType: 'text/plain',
      data: Buffer.from('hello'),
      recipientUsername,
    });

  it('filters the user listing by admin flag', async () => {
    const admins = await adminService.listUsers({ isAdmin: true });
    const everyone = await adminService.listUsers();

    expect(admins.map(u => u.username)).toEqual(['ADMIN1']);
    expect(everyone).toHaveLength(3);
  });

  it('deactivates and reactivates an account', async () => {
    await expect(adminService.setActive(admin, alice.id, false)).resolves.toMatchObject({ isActive: false });
    await expect(adminService.setActive(admin, alice.id, true)).resolves.toMatchObject({ isActive: true });
  });

  it('grants and revokes the admin flag', async () => {
    await expect(adminService.setAdmin(admin, alice.id, true)).resolves.toMatchObject({ isAdmin: true });
    await expect(adminService.setAdmin(admin, alice.id, false)).resolves.toMatchObject({ isAdmin: false });
  });

  it('does not let an admin lock themselves out', async () => {
    await expect(adminService.setActive(admin, admin.id, false)).rejects.toMatchObject({ code: 'CannotModifySelf' });
    await expect(adminService.setAdmin(admin, admin.id, false)).rejects.toMatchObject({ code: 'CannotModifySelf' });
    await expect(adminService.deleteUser(admin, admin.id)).rejects.toMatchObject({ code: 'CannotModifySelf' });
  });

  it('reports unknown accounts', async () => {
    await expect(adminService.setActive(admin, 999, false)).rejects.toMatchObject({ code: 'UserNotFound' });
    await expect(adminService.deleteUser(admin, 999)).rejects.toMatchObject({ code: 'UserNotFound' });
  });

  it('deletes a user with their files and detaches files addressed to them', async () => {
    const aliceOwn = await upload(alice, 'BOBBY1');
    const toAlice = await upload(bob, 'ALICE1');

    const result = await adminService.deleteUser(admin, alice.id);

    expect(result).toEqual({ deletedFiles: 1 });
    await expect(users.findById(alice.id)).resolves.toBeNull();
    await expect(files.findById(aliceOwn.id)).resolves.toBeNull();
    expect(blobs.blobs.has(aliceOwn.storedFilename)).toBe(false);
    await expect(files.findById(toAlice.id)).resolves.toMatchObject({ recipientId: null });
    expect(blobs.blobs.has(toAlice.storedFilename)).toBe(true);
  });

  it('deletes any file with its blob', async () => {
    const record = await upload(alice);
    await adminService.deleteFile(admin, record.id);

    await expect(adminService.listFiles()).resolves.toEqual([]);
    expect(blobs.blobs.size).toBe(0);
    await expect(adminService.deleteFile(admin, record.id)).rejects.toMatchObject({ code: 'FileNotFound' });
  });
});
