/** A registered account as the services see it. */
export interface User {
  id: number;
  username: string;
  email: string;
  hashedPassword: string;
  isActive: boolean;
  isAdmin: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** Metadata for one uploaded blob. */
export interface FileRecord {
  id: number;
  /** Name supplied by the uploader; display only. */
  filename: string;
  /** Server-generated blob key, never derived from request input. */
  storedFilename: string;
  ownerId: number;
  recipientId: number | null;
  size: number;
  mimeType: string;
  uploadedAt: Date;
}

export type NewUser = Pick<User, 'username' | 'email' | 'hashedPassword'> &
  Partial<Pick<User, 'isActive' | 'isAdmin'>>;

export type NewFileRecord = Omit<FileRecord, 'id'>;
