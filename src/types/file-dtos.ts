import { FileRecord } from './domain';

/** Listing entry for files addressed to the caller. */
export interface ReceivedFileDTO {
  id: number;
  filename: string;
  saved_filename: string;
  owner_id: number;
  uploaded_at: string; // ISO 8601
}

/** Listing entry for the caller's own uploads. */
export interface OwnedFileDTO {
  id: number;
  filename: string;
  saved_filename: string;
  recipient_id: number | null;
  size: number;
  uploaded_at: string; // ISO 8601
}

/** Admin listing: no stored filename, so the listing grants nothing to download with. */
export interface AdminFileDTO {
  id: number;
  filename: string;
  owner_id: number;
  recipient_id: number | null;
  size: number;
  uploaded_at: string; // ISO 8601
}

export class FileDTOMapper {
  static toReceivedDTO(file: FileRecord): ReceivedFileDTO {
    return {
      id: file.id,
      filename: file.filename,
      saved_filename: file.storedFilename,
      owner_id: file.ownerId,
      uploaded_at: file.uploadedAt.toISOString(),
    };
  }

  static toOwnedDTO(file: FileRecord): OwnedFileDTO {
    return {
      id: file.id,
      filename: file.filename,
      saved_filename: file.storedFilename,
      recipient_id: file.recipientId,
      size: file.size,
      uploaded_at: file.uploadedAt.toISOString(),
    };
  }

  static toAdminDTO(file: FileRecord): AdminFileDTO {
    return {
      id: file.id,
      filename: file.filename,
      owner_id: file.ownerId,
      recipient_id: file.recipientId,
      size: file.size,
      uploaded_at: file.uploadedAt.toISOString(),
    };
  }
}
