import { randomUUID } from 'crypto';
import { FileRepository } from '../repositories/file.repository';
import { UserRepository } from '../repositories/user.repository';
import { BlobExistsError, BlobStore } from '../storage/blob.store';
import { FileRecord, User } from '../types/domain';
import { ServiceError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { canDownload } from './fileAccess';

const MAX_NAME_ATTEMPTS = 3;

export interface IUploadInput {
  originalName: string;
  mimeType: string;
  data: Buffer;
  recipientUsername?: string;
}

export interface IDownload {
  file: FileRecord;
  data: Buffer;
}

export class FileService {
  constructor(
    private readonly files: FileRepository,
    private readonly users: UserRepository,
    private readonly blobs: BlobStore
  ) {}

  /**
   * Stores an upload. The blob is written first and the record committed only afterwards,
   * so no record ever points at a missing blob.
   * @throws {ServiceError} - 'RecipientNotFound' | 'StoredFilenameTaken'.
   */
  public async upload(owner: User, input: IUploadInput): Promise<FileRecord> {
    // 1. Resolve the optional recipient
    let recipientId: number | null = null;
    if (input.recipientUsername) {
      const recipient = await this.users.findByUsername(input.recipientUsername);
      if (!recipient) {
        throw new ServiceError('RecipientNotFound');
      }
      recipientId = recipient.id;
    }

    // 2. Write the blob under a fresh server-generated name
    const storedFilename = await this.saveBlob(input.data);

    // 3. Commit the metadata; remove the blob again if that fails
    try {
      const record = await this.files.create({
        filename: input.originalName,
        storedFilename,
        ownerId: owner.id,
        recipientId,
        size: input.data.length,
        mimeType: input.mimeType,
        uploadedAt: new Date(),
      });
      logger.info('File uploaded', { fileId: record.id, ownerId: owner.id, recipientId });
      return record;
    } catch (error: unknown) {
      await this.discardBlob(storedFilename);
      throw error;
    }
  }

  /**
   * Loads a file for `requester` after the owner/recipient check.
   * @throws {ServiceError} - 'FileNotFound' | 'PermissionDenied' | 'BlobNotFound'.
   */
  public async prepareDownload(storedFilename: string, requester: User): Promise<IDownload> {
    const file = await this.files.findByStoredFilename(storedFilename);
    if (!file) {
      throw new ServiceError('FileNotFound');
    }

    if (!canDownload(file, requester)) {
      logger.warn('Download denied', { fileId: file.id, userId: requester.id });
      throw new ServiceError('PermissionDenied');
    }

    const data = await this.blobs.read(file.storedFilename);
    if (!data) {
      logger.error('Blob missing for file record', { fileId: file.id });
      throw new ServiceError('BlobNotFound');
    }

    return { file, data };
  }

  public async listOwned(owner: User): Promise<FileRecord[]> {
    return this.files.listByOwner(owner.id);
  }

  public async listReceived(recipient: User): Promise<FileRecord[]> {
    return this.files.listByRecipient(recipient.id);
  }

  /**
   * Deletes one of the caller's own files. The record goes first, then the blob.
   * @throws {ServiceError} - 'FileNotFound' | 'PermissionDenied'.
   */
  public async deleteOwned(owner: User, fileId: number): Promise<void> {
    const file = await this.files.findById(fileId);
    if (!file) {
      throw new ServiceError('FileNotFound');
    }
    if (file.ownerId !== owner.id) {
      throw new ServiceError('PermissionDenied');
    }

    await this.files.delete(file.id);
    await this.discardBlob(file.storedFilename);
    logger.info('File deleted by owner', { fileId: file.id, ownerId: owner.id });
  }

  private async saveBlob(data: Buffer): Promise<string> {
    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const storedFilename = randomUUID();
      try {
        await this.blobs.save(storedFilename, data);
        return storedFilename;
      } catch (error: unknown) {
        if (!(error instanceof BlobExistsError)) throw error;
      }
    }
    throw new ServiceError('StoredFilenameTaken');
  }

  /** Best-effort removal; a blob left behind is unreferenced and harmless. */
  private async discardBlob(storedFilename: string): Promise<void> {
    try {
      await this.blobs.remove(storedFilename);
    } catch (error: unknown) {
      logger.error('Failed to remove blob', { storedFilename, error: describeError(error) });
    }
  }
}
