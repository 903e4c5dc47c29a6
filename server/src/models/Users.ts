/// src/models/Users.ts
import mongoose, { Schema } from "mongoose";

export const ROLES = [
  "admin",
  "doctor",
  "nurse",
  "receptionist",
  "patient",
  "lab_technician",
  "pharmacist",
] as const;
export type Role = (typeof ROLES)[number];

export interface IUser {
  user_id: string;
  email: string; // stored lowercased
  password: string; // bcrypt hash
  role: Role;
  profile_id: string | null; // doctor_id or patient_id this login acts as
  is_active: boolean;
  failed_login_attempts: number;
  locked_until: Date | null;
}

const UserSchema = new Schema<IUser>(
  {
    user_id: { type: String, required: true, unique: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    password: { type: String, required: true },
    role: { type: String, enum: [...ROLES], required: true },
    profile_id: { type: String, default: null },
    is_active: { type: Boolean, default: true },
    failed_login_attempts: { type: Number, default: 0 },
    locked_until: { type: Date, default: null },
  }
  // no timestamps
);

export const User = mongoose.model<IUser>(
  "User",
  UserSchema,
  "users"
);
