import { Schema, model } from 'mongoose';

export interface IUser {
  _id: number; // Sequential numeric id (see counter.model)
  username: string;
  email: string;
  hashedPassword: string;
  isActive: boolean;
  isAdmin: boolean;
  createdAt?: Date;
  updatedAt?: Date;
}

const UserSchema = new Schema<IUser>(
  {
    _id: { type: Number, required: true },
    username: { type: String, required: true, unique: true, immutable: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    hashedPassword: { type: String, required: true },
    isActive: { type: Boolean, default: true },
    isAdmin: { type: Boolean, default: false, index: true },
  },
  { timestamps: true, versionKey: false }
);

export const UserModel = model<IUser>('User', UserSchema);
