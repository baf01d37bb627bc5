import { FileModel, IFile } from '../models/file.model';
import { nextSequence } from '../models/counter.model';
import { FileRecord, NewFileRecord } from '../types/domain';
import { ServiceError } from '../utils/errors';
import { duplicateKeyField } from './mongoErrors';

/**
 * File metadata store. Owner/recipient links are plain foreign keys queried explicitly.
 */
export interface FileRepository {
  /** @throws {ServiceError} 'StoredFilenameTaken' on a unique-key conflict */
  create(data: NewFileRecord): Promise<FileRecord>;
  findById(id: number): Promise<FileRecord | null>;
  findByStoredFilename(storedFilename: string): Promise<FileRecord | null>;
  listByOwner(ownerId: number): Promise<FileRecord[]>;
  listByRecipient(recipientId: number): Promise<FileRecord[]>;
  listAll(): Promise<FileRecord[]>;
  delete(id: number): Promise<boolean>;
  /** Removes every record owned by `ownerId` and returns them. */
  deleteByOwner(ownerId: number): Promise<FileRecord[]>;
  /** Sets recipientId to null wherever it equals `recipientId`; returns the count. */
  clearRecipient(recipientId: number): Promise<number>;
}

const toFileRecord = (doc: IFile): FileRecord => ({
  id: doc._id,
  filename: doc.filename,
  storedFilename: doc.storedFilename,
  ownerId: doc.ownerId,
  recipientId: doc.recipientId ?? null,
  size: doc.size,
  mimeType: doc.mimeType,
  uploadedAt: doc.uploadedAt,
});

export class MongoFileRepository implements FileRepository {
  public async create(data: NewFileRecord): Promise<FileRecord> {
    const _id = await nextSequence('files');
    try {
      const saved = await new FileModel({ _id, ...data }).save();
      return toFileRecord(saved.toObject());
    } catch (error: unknown) {
      if (duplicateKeyField(error) === 'storedFilename') {
        throw new ServiceError('StoredFilenameTaken');
      }
      throw error;
    }
  }

  public async findById(id: number): Promise<FileRecord | null> {
    const doc = await FileModel.findById(id).lean<IFile>();
    return doc ? toFileRecord(doc) : null;
  }

  public async findByStoredFilename(storedFilename: string): Promise<FileRecord | null> {
    const doc = await FileModel.findOne({ storedFilename }).lean<IFile>();
    return doc ? toFileRecord(doc) : null;
  }

  public async listByOwner(ownerId: number): Promise<FileRecord[]> {
    const docs = await FileModel.find({ ownerId }).sort({ uploadedAt: -1 }).lean<IFile[]>();
    return docs.map(toFileRecord);
  }

  public async listByRecipient(recipientId: number): Promise<FileRecord[]> {
    const docs = await FileModel.find({ recipientId }).sort({ uploadedAt: -1 }).lean<IFile[]>();
    return docs.map(toFileRecord);
  }

  public async listAll(): Promise<FileRecord[]> {
    const docs = await FileModel.find({}).sort({ _id: 1 }).lean<IFile[]>();
    return docs.map(toFileRecord);
  }

  public async delete(id: number): Promise<boolean> {
    const result = await FileModel.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }

  public async deleteByOwner(ownerId: number): Promise<FileRecord[]> {
    const owned = await FileModel.find({ ownerId }).lean<IFile[]>();
    if (owned.length === 0) return [];

    await FileModel.deleteMany({ _id: { $in: owned.map(doc => doc._id) } });
    return owned.map(toFileRecord);
  }

  public async clearRecipient(recipientId: number): Promise<number> {
    const result = await FileModel.updateMany({ recipientId }, { $set: { recipientId: null } });
    return result.modifiedCount;
  }
}
