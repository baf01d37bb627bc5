import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import path from 'path';

/** Raised by `save` when a blob with the same name already exists. */
export class BlobExistsError extends Error {
  constructor(name: string) {
    super(`Blob already exists: ${name}`);
    this.name = 'BlobExistsError';
  }
}

/**
 * Byte storage addressed by server-generated names.
 * `save` must create exclusively so two uploads can never share a key.
 */
export interface BlobStore {
  save(name: string, data: Buffer): Promise<void>;
  /** Resolves to null when no blob has that name. */
  read(name: string): Promise<Buffer | null>;
  /** Resolves to false when there was nothing to remove. */
  remove(name: string): Promise<boolean>;
}

const errnoCode = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

// Stored names are uuids; anything else is refused before touching the filesystem
const SAFE_NAME = /^[A-Za-z0-9-]{1,128}$/;

export class LocalBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /** Creates the storage directory. Called once at startup. */
  public async init(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  private pathFor(name: string): string {
    if (!SAFE_NAME.test(name)) {
      throw new Error(`Refusing unsafe blob name: ${JSON.stringify(name)}`);
    }
    return path.join(this.root, name);
  }

  public async save(name: string, data: Buffer): Promise<void> {
    try {
      await writeFile(this.pathFor(name), data, { flag: 'wx' });
    } catch (error: unknown) {
      if (errnoCode(error) === 'EEXIST') {
        throw new BlobExistsError(name);
      }
      throw error;
    }
  }

  public async read(name: string): Promise<Buffer | null> {
    if (!SAFE_NAME.test(name)) return null;
    try {
      return await readFile(this.pathFor(name));
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') return null;
      throw error;
    }
  }

  public async remove(name: string): Promise<boolean> {
    if (!SAFE_NAME.test(name)) return false;
    try {
      await unlink(this.pathFor(name));
      return true;
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') return false;
      throw error;
    }
  }
}
