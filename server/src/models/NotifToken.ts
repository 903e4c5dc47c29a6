// src/models/NotifToken.ts
import mongoose, { Schema } from "mongoose";

export interface INotifToken {
  token: string;       // Expo push token
  patient_id: string;  // Reference to Patient
  created_at: Date;
}

const NotifTokenSchema = new Schema<INotifToken>(
  {
    token: { type: String, required: true },
    patient_id: { type: String, required: true, ref: "Patient" },
    created_at: { type: Date, default: Date.now },
  }
);

// Prevent duplicate token per patient
NotifTokenSchema.index({ token: 1, patient_id: 1 }, { unique: true });

export const NotifToken = mongoose.model<INotifToken>(
  "NotifToken",
  NotifTokenSchema,
  "notif_tokens"
);
