import { FileRecord, User } from '../types/domain';

/**
 * Download rule: only the owner or the addressed recipient.
 * The admin flag is not consulted here.
 */
export const canDownload = (
  file: Pick<FileRecord, 'ownerId' | 'recipientId'>,
  user: Pick<User, 'id'>
): boolean => user.id === file.ownerId || (file.recipientId !== null && user.id === file.recipientId);
