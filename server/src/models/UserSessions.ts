/// src/models/UserSessions.ts
import mongoose, { Schema } from "mongoose";

// One issued token pair. session_id is the refresh token's jti.
export interface IUserSession {
  session_id: string;
  user_id: string;
  issued_at: Date;
  expires_at: Date;
  revoked: boolean;
  revoked_at: Date | null;
  ip_address: string;
  user_agent: string;
}

const UserSessionSchema = new Schema<IUserSession>({
  session_id: { type: String, required: true, unique: true },
  user_id: { type: String, required: true, ref: "User" },
  issued_at: { type: Date, required: true },
  expires_at: { type: Date, required: true },
  revoked: { type: Boolean, default: false },
  revoked_at: { type: Date, default: null },
  ip_address: { type: String, default: "" },
  user_agent: { type: String, default: "" },
});

UserSessionSchema.index({ user_id: 1, issued_at: -1 });

export const UserSession = mongoose.model<IUserSession>(
  "UserSession",
  UserSessionSchema,
  "user_sessions"
);
