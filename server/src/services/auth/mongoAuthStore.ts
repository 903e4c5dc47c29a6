// src/services/auth/mongoAuthStore.ts
import { User, type IUser } from "../../models/Users";
import { UserActivity, type IUserActivity } from "../../models/UserActivities";
import { UserSession, type IUserSession } from "../../models/UserSessions";
import type { AuthStore } from "./types";

const toUser = (doc: IUser): IUser => ({
  user_id: doc.user_id,
  email: doc.email,
  password: doc.password,
  role: doc.role,
  profile_id: doc.profile_id ?? null,
  is_active: doc.is_active,
  failed_login_attempts: doc.failed_login_attempts ?? 0,
  locked_until: doc.locked_until ?? null,
});

const toSession = (doc: IUserSession): IUserSession => ({
  session_id: doc.session_id,
  user_id: doc.user_id,
  issued_at: doc.issued_at,
  expires_at: doc.expires_at,
  revoked: doc.revoked,
  revoked_at: doc.revoked_at ?? null,
  ip_address: doc.ip_address,
  user_agent: doc.user_agent,
});

export class MongoAuthStore implements AuthStore {
  async findUserByEmail(email: string): Promise<IUser | null> {
    const doc = await User.findOne({ email: email.toLowerCase() }).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  async findUserById(userId: string): Promise<IUser | null> {
    const doc = await User.findOne({ user_id: userId }).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  async recordFailedLogin(userId: string, maxAttempts: number, lockUntil: Date): Promise<void> {
    const updated = await User.findOneAndUpdate(
      { user_id: userId },
      { $inc: { failed_login_attempts: 1 } },
      { new: true }
    ).lean<IUser>();

    if (updated && updated.failed_login_attempts >= maxAttempts) {
      await User.updateOne(
        { user_id: userId },
        { $set: { locked_until: lockUntil, failed_login_attempts: 0 } }
      );
      console.warn(`Account ${userId} locked until ${lockUntil.toISOString()}`);
    }
  }

  async resetFailedLogins(userId: string): Promise<void> {
    await User.updateOne({ user_id: userId }, { $set: { failed_login_attempts: 0, locked_until: null } });
  }

  async createSession(session: IUserSession): Promise<void> {
    await UserSession.create(session);
  }

  async findSession(sessionId: string): Promise<IUserSession | null> {
    const doc = await UserSession.findOne({ session_id: sessionId }).lean<IUserSession>();
    return doc ? toSession(doc) : null;
  }

  async revokeSession(sessionId: string, at: Date): Promise<void> {
    // Filter on revoked:false so a repeat logout keeps the first revoked_at
    await UserSession.updateOne(
      { session_id: sessionId, revoked: false },
      { $set: { revoked: true, revoked_at: at } }
    );
  }

  async appendActivity(activity: IUserActivity): Promise<void> {
    await UserActivity.create(activity);
  }

  async findSessionsByUser(userId: string): Promise<IUserSession[]> {
    const docs = await UserSession.find({ user_id: userId }).sort({ issued_at: -1 }).lean<IUserSession[]>();
    return docs.map(toSession);
  }

  async listActivities(userId: string | null, limit: number): Promise<IUserActivity[]> {
    const filter = userId === null ? {} : { user_id: userId };
    const docs = await UserActivity.find(filter).sort({ timestamp: -1 }).limit(limit).lean<IUserActivity[]>();
    return docs.map((doc) => ({
      user_id: doc.user_id ?? null,
      identifier: doc.identifier,
      action: doc.action,
      outcome: doc.outcome,
      description: doc.description,
      ip_address: doc.ip_address,
      timestamp: doc.timestamp,
    }));
  }
}
