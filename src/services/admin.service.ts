import { FileRepository } from '../repositories/file.repository';
import { UserRepository } from '../repositories/user.repository';
import { BlobStore } from '../storage/blob.store';
import { FileRecord, User } from '../types/domain';
import { ServiceError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export class AdminService {
  constructor(
    private readonly users: UserRepository,
    private readonly files: FileRepository,
    private readonly blobs: BlobStore
  ) {}

  public async listUsers(filter: { isAdmin?: boolean } = {}): Promise<User[]> {
    return this.users.list(filter);
  }

  public async listFiles(): Promise<FileRecord[]> {
    return this.files.listAll();
  }

  /**
   * Activates or deactivates an account. Existing tokens of a deactivated account are refused by the gate.
   * @throws {ServiceError} - 'UserNotFound' | 'CannotModifySelf'.
   */
  public async setActive(actor: User, targetUserId: number, isActive: boolean): Promise<User> {
    if (!isActive && actor.id === targetUserId) {
      throw new ServiceError('CannotModifySelf');
    }

    const user = await this.users.update(targetUserId, { isActive });
    if (!user) {
      throw new ServiceError('UserNotFound');
    }

    logger.info(isActive ? 'User activated' : 'User deactivated', {
      targetUserId,
      actorId: actor.id,
    });
    return user;
  }

  /** @throws {ServiceError} - 'UserNotFound' | 'CannotModifySelf'. */
  public async setAdmin(actor: User, targetUserId: number, isAdmin: boolean): Promise<User> {
    if (!isAdmin && actor.id === targetUserId) {
      throw new ServiceError('CannotModifySelf');
    }

    const user = await this.users.update(targetUserId, { isAdmin });
    if (!user) {
      throw new ServiceError('UserNotFound');
    }

    logger.info(isAdmin ? 'Admin granted' : 'Admin revoked', { targetUserId, actorId: actor.id });
    return user;
  }

  /**
   * Deletes an account. Owned files (records and blobs) go with it;
   * files addressed to it lose their recipient.
   * @throws {ServiceError} - 'UserNotFound' | 'CannotModifySelf'.
   */
  public async deleteUser(actor: User, targetUserId: number): Promise<{ deletedFiles: number }> {
    if (actor.id === targetUserId) {
      throw new ServiceError('CannotModifySelf');
    }

    const target = await this.users.findById(targetUserId);
    if (!target) {
      throw new ServiceError('UserNotFound');
    }

    const owned = await this.files.deleteByOwner(target.id);
    await this.files.clearRecipient(target.id);
    await this.users.delete(target.id);

    for (const file of owned) {
      await this.discardBlob(file);
    }

    logger.info('User deleted', { targetUserId, actorId: actor.id, deletedFiles: owned.length });
    return { deletedFiles: owned.length };
  }

  /** @throws {ServiceError} - 'FileNotFound'. */
  public async deleteFile(actor: User, fileId: number): Promise<void> {
    const file = await this.files.findById(fileId);
    if (!file) {
      throw new ServiceError('FileNotFound');
    }

    await this.files.delete(file.id);
    await this.discardBlob(file);
    logger.info('File deleted by admin', { fileId, actorId: actor.id });
  }

  private async discardBlob(file: FileRecord): Promise<void> {
    try {
      await this.blobs.remove(file.storedFilename);
    } catch (error: unknown) {
      logger.error('Failed to remove blob', { fileId: file.id, error: describeError(error) });
    }
  }
}
