import mongoose from "mongoose";

export type UserDocument = {
  uid: string;
  email: string | null;
  name: string | null;
  createdAt: string;
  lastLoginAt: string;
};

const UserSchema = new mongoose.Schema<UserDocument>({
  uid: { type: String, required: true, unique: true, index: true },
  email: { type: String, default: null },
  name: { type: String, default: null },
  createdAt: { type: String, required: true },
  lastLoginAt: { type: String, required: true }
});

export const User = mongoose.model<UserDocument>("User", UserSchema);
