import * as counterModel from '../../src/models/counter.model';
import { FileModel } from '../../src/models/file.model';
import { UserModel } from '../../src/models/user.model';
import { MongoFileRepository } from '../../src/repositories/file.repository';
import { MongoUserRepository } from '../../src/repositories/user.repository';
import { ServiceError } from '../../src/utils/errors';

const duplicateKey = (field: string) =>
  Object.assign(new Error('E11000 duplicate key error collection'), {
    code: 11000,
    keyPattern: { [field]: 1 },
    keyValue: { [field]: 'taken' },
  });

describe('Mongo repositories', () => {
  beforeEach(() => {
    jest.spyOn(counterModel, 'nextSequence').mockResolvedValue(7);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('MongoUserRepository.create', () => {
    const newUser = { username: 'ABC123', email: 'a@example.com', hashedPassword: 'hash' };

    it.each([
      ['username', 'UsernameTaken'],
      ['email', 'EmailAlreadyExists'],
    ])('maps a duplicate %s to %s', async (field, code) => {
      jest.spyOn(UserModel.prototype, 'save').mockRejectedValue(duplicateKey(field));

      const result = new MongoUserRepository().create(newUser);

      await expect(result).rejects.toBeInstanceOf(ServiceError);
      await expect(result).rejects.toMatchObject({ code });
    });

    it('passes other failures through unchanged', async () => {
      const failure = new Error('connection reset');
      jest.spyOn(UserModel.prototype, 'save').mockRejectedValue(failure);

      await expect(new MongoUserRepository().create(newUser)).rejects.toBe(failure);
    });
  });

  describe('MongoFileRepository.create', () => {
    const newFile = {
      filename: 'notes.txt',
      storedFilename: '0f8fad5b-d9cb-469f-a165-70867728950e',
      ownerId: 1,
      recipientId: null,
      size: 3,
      mimeType: 'text/plain',
      uploadedAt: new Date('2024-01-01T00:00:00Z'),
    };

    it('maps a duplicate stored filename to StoredFilenameTaken', async () => {
      jest.spyOn(FileModel.prototype, 'save').mockRejectedValue(duplicateKey('storedFilename'));

      await expect(new MongoFileRepository().create(newFile)).rejects.toMatchObject({
        code: 'StoredFilenameTaken',
      });
    });

    it('passes a duplicate on another key through', async () => {
      const failure = duplicateKey('_id');
      jest.spyOn(FileModel.prototype, 'save').mockRejectedValue(failure);

      await expect(new MongoFileRepository().create(newFile)).rejects.toBe(failure);
    });
  });
});
