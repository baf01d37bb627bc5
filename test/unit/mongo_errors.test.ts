import { duplicateKeyField } from '../../src/repositories/mongoErrors';

const duplicateKey = (fields: Record<string, unknown>) =>
  Object.assign(new Error('E11000 duplicate key error collection'), { code: 11000, ...fields });

describe('duplicateKeyField', () => {
  it('reads the field from keyPattern', () => {
    const error = duplicateKey({ keyPattern: { username: 1 }, keyValue: { username: 'ABC123' } });
    expect(duplicateKeyField(error)).toBe('username');
  });

  it('falls back to keyValue when keyPattern is missing', () => {
    expect(duplicateKeyField(duplicateKey({ keyValue: { email: 'a@example.com' } }))).toBe('email');
  });

  it('falls back to keyValue when keyPattern is empty', () => {
    expect(duplicateKeyField(duplicateKey({ keyPattern: {}, keyValue: { storedFilename: 'x' } }))).toBe(
      'storedFilename'
    );
  });

  it('reports _id when the server names no field', () => {
    expect(duplicateKeyField(duplicateKey({}))).toBe('_id');
  });

  it('ignores other errors', () => {
    expect(duplicateKeyField(Object.assign(new Error('write conflict'), { code: 112 }))).toBeNull();
    expect(duplicateKeyField(new Error('network down'))).toBeNull();
    expect(duplicateKeyField('11000')).toBeNull();
    expect(duplicateKeyField(null)).toBeNull();
  });
});
