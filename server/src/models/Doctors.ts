/// src/models/Doctors.ts
import mongoose, { Schema } from "mongoose";

export interface IDoctor {
  doctor_id: string; // e.g., DOC-001
  user_id: string; // FK -> User (the doctor's login)
  is_active: boolean;
}

const DoctorSchema = new Schema<IDoctor>({
  doctor_id: { type: String, required: true, unique: true },
  user_id: { type: String, required: true, ref: "User" },
  is_active: { type: Boolean, default: true },
});

export const Doctor = mongoose.model<IDoctor>("Doctor", DoctorSchema, "doctors");
