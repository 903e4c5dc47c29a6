/// src/models/DoctorAvailability.ts
import mongoose, { Schema } from "mongoose";

export interface IDoctorAvailability {
  doctor_id: string; // FK -> Doctor
  day_of_week: number; // 0 = Monday ... 6 = Sunday
  start_time: string; // "HH:mm"
  end_time: string; // "HH:mm"
  break_start_time: string | null; // optional, "HH:mm"
  break_end_time: string | null;
  is_available: boolean;
}

const DoctorAvailabilitySchema = new Schema<IDoctorAvailability>(
  {
    doctor_id: { type: String, required: true, ref: "Doctor" },
    day_of_week: { type: Number, required: true, min: 0, max: 6 },
    start_time: { type: String, required: true },
    end_time: { type: String, required: true },
    break_start_time: { type: String, default: null },
    break_end_time: { type: String, default: null },
    is_available: { type: Boolean, default: true },
  }
);

DoctorAvailabilitySchema.index({ doctor_id: 1, day_of_week: 1 });

export const DoctorAvailability = mongoose.model<IDoctorAvailability>(
  "DoctorAvailability",
  DoctorAvailabilitySchema,
  "doctor_availability"
);
