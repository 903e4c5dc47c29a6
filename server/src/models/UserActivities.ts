/// src/models/UserActivities.ts
import mongoose, { Schema } from "mongoose";

export type ActivityAction = "login" | "logout";
export type ActivityOutcome = "success" | "failure";

export interface IUserActivity {
  user_id: string | null; // null when the identifier matched no user
  identifier: string;
  action: ActivityAction;
  outcome: ActivityOutcome;
  description: string;
  ip_address: string;
  timestamp: Date;
}

const UserActivitySchema = new Schema<IUserActivity>({
  user_id: { type: String, default: null, ref: "User" },
  identifier: { type: String, required: true },
  action: { type: String, enum: ["login", "logout"], required: true },
  outcome: { type: String, enum: ["success", "failure"], required: true },
  description: { type: String, default: "" },
  ip_address: { type: String, default: "" },
  timestamp: { type: Date, required: true },
});

UserActivitySchema.index({ user_id: 1, timestamp: -1 });
UserActivitySchema.index({ action: 1, timestamp: -1 });

export const UserActivity = mongoose.model<IUserActivity>(
  "UserActivity",
  UserActivitySchema,
  "user_activities"
);
