import { Schema, model } from 'mongoose';

export interface IFile {
  _id: number;
  filename: string; // Original name, display only
  storedFilename: string; // Blob key (uuid), unique
  ownerId: number;
  recipientId: number | null;
  size: number;
  mimeType: string;
  uploadedAt: Date;
}

const FileSchema = new Schema<IFile>(
  {
    _id: { type: Number, required: true },
    filename: { type: String, required: true, maxlength: 1024 },
    storedFilename: { type: String, required: true, unique: true, immutable: true },
    ownerId: { type: Number, ref: 'User', required: true, index: true },
    recipientId: { type: Number, ref: 'User', default: null, index: true },
    size: { type: Number, required: true, min: 0 },
    mimeType: { type: String, required: true },
    uploadedAt: { type: Date, required: true, default: Date.now },
  },
  { versionKey: false }
);

FileSchema.index({ ownerId: 1, uploadedAt: -1 });

export const FileModel = model<IFile>('File', FileSchema);
