import { UserModel, IUser } from '../models/user.model';
import { nextSequence } from '../models/counter.model';
import { NewUser, User } from '../types/domain';
import { ServiceError } from '../utils/errors';
import { duplicateKeyField } from './mongoErrors';

export type UserUpdate = Partial<Pick<User, 'isActive' | 'isAdmin' | 'hashedPassword'>>;

/**
 * Credential store. Implementations must enforce username and email uniqueness atomically
 * and report a violation as ServiceError 'UsernameTaken' or 'EmailAlreadyExists'.
 */
export interface UserRepository {
  create(data: NewUser): Promise<User>;
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  list(filter?: { isAdmin?: boolean }): Promise<User[]>;
  update(id: number, changes: UserUpdate): Promise<User | null>;
  delete(id: number): Promise<boolean>;
}

const toUser = (doc: IUser): User => ({
  id: doc._id,
  username: doc.username,
  email: doc.email,
  hashedPassword: doc.hashedPassword,
  isActive: doc.isActive,
  isAdmin: doc.isAdmin,
  createdAt: doc.createdAt ?? new Date(0),
  updatedAt: doc.updatedAt ?? doc.createdAt ?? new Date(0),
});

export class MongoUserRepository implements UserRepository {
  public async create(data: NewUser): Promise<User> {
    const _id = await nextSequence('users');
    try {
      const saved = await new UserModel({
        _id,
        username: data.username,
        email: data.email,
        hashedPassword: data.hashedPassword,
        isActive: data.isActive ?? true,
        isAdmin: data.isAdmin ?? false,
      }).save();
      return toUser(saved.toObject());
    } catch (error: unknown) {
      const field = duplicateKeyField(error);
      if (field === 'username') throw new ServiceError('UsernameTaken');
      if (field === 'email') throw new ServiceError('EmailAlreadyExists');
      throw error;
    }
  }

  public async findById(id: number): Promise<User | null> {
    const doc = await UserModel.findById(id).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  public async findByUsername(username: string): Promise<User | null> {
    const doc = await UserModel.findOne({ username }).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  public async findByEmail(email: string): Promise<User | null> {
    const doc = await UserModel.findOne({ email: email.toLowerCase() }).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  public async list(filter: { isAdmin?: boolean } = {}): Promise<User[]> {
    const query = filter.isAdmin === undefined ? {} : { isAdmin: filter.isAdmin };
    const docs = await UserModel.find(query).sort({ _id: 1 }).lean<IUser[]>();
    return docs.map(toUser);
  }

  public async update(id: number, changes: UserUpdate): Promise<User | null> {
    const doc = await UserModel.findByIdAndUpdate(id, { $set: changes }, { new: true }).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  public async delete(id: number): Promise<boolean> {
    const result = await UserModel.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
