// src/services/booking/mongoBookingStore.ts
import mongoose, { type ClientSession } from "mongoose";
import { Appointment, type AppointmentStatus, type IAppointment } from "../../models/Appointments";
import { AppointmentHistory, type IAppointmentHistory } from "../../models/AppointmentHistory";
import { Doctor, type IDoctor } from "../../models/Doctors";
import { DoctorAvailability, type IDoctorAvailability } from "../../models/DoctorAvailability";
import { DoctorScheduleLock } from "../../models/DoctorScheduleLock";
import { ACTIVE_STATUSES, type AppointmentFilter, type BookingStore, type BookingTransaction, type StatusPatch } from "./types";

const DUPLICATE_KEY = 11000;

const isDuplicateKeyError = (err: unknown) =>
  typeof err === "object" && err !== null && "code" in err && err.code === DUPLICATE_KEY;

const toAppointment = (doc: IAppointment): IAppointment => ({
  appointment_id: doc.appointment_id,
  patient_id: doc.patient_id,
  doctor_id: doc.doctor_id,
  appointment_date: doc.appointment_date,
  time_start: doc.time_start,
  time_end: doc.time_end,
  duration_minutes: doc.duration_minutes,
  appointment_type: doc.appointment_type ?? null,
  status: doc.status,
  reason: doc.reason,
  created_by: doc.created_by,
  cancelled_at: doc.cancelled_at ?? null,
  cancelled_by: doc.cancelled_by ?? null,
  cancellation_reason: doc.cancellation_reason ?? null,
  completed_at: doc.completed_at ?? null,
  no_show_at: doc.no_show_at ?? null,
  created_at: doc.created_at,
  updated_at: doc.updated_at,
});

const activeFilter = (doctorId: string, date: string) => ({
  doctor_id: doctorId,
  appointment_date: date,
  status: { $in: [...ACTIVE_STATUSES] },
});

/**
 * Mongoose-backed BookingStore. Multi-document writes use transactions, so
 * MONGO_URI must point at a replica set.
 */
export class MongoBookingStore implements BookingStore {
  async findDoctor(doctorId: string): Promise<IDoctor | null> {
    const doc = await Doctor.findOne({ doctor_id: doctorId }).lean<IDoctor>();
    return doc ? { doctor_id: doc.doctor_id, user_id: doc.user_id, is_active: doc.is_active } : null;
  }

  async listAvailability(doctorId: string, dayOfWeek: number): Promise<IDoctorAvailability[]> {
    const docs = await DoctorAvailability.find({ doctor_id: doctorId, day_of_week: dayOfWeek })
      .sort({ start_time: 1 })
      .lean<IDoctorAvailability[]>();
    return docs.map((doc) => ({
      doctor_id: doc.doctor_id,
      day_of_week: doc.day_of_week,
      start_time: doc.start_time,
      end_time: doc.end_time,
      break_start_time: doc.break_start_time ?? null,
      break_end_time: doc.break_end_time ?? null,
      is_available: doc.is_available,
    }));
  }

  async listActiveAppointments(doctorId: string, date: string): Promise<IAppointment[]> {
    const docs = await Appointment.find(activeFilter(doctorId, date))
      .sort({ time_start: 1 })
      .lean<IAppointment[]>();
    return docs.map(toAppointment);
  }

  async findAppointment(appointmentId: string): Promise<IAppointment | null> {
    const doc = await Appointment.findOne({ appointment_id: appointmentId }).lean<IAppointment>();
    return doc ? toAppointment(doc) : null;
  }

  async listAppointments(filter: AppointmentFilter): Promise<IAppointment[]> {
    const query: Record<string, string> = {};
    if (filter.patient_id !== undefined) query.patient_id = filter.patient_id;
    if (filter.doctor_id !== undefined) query.doctor_id = filter.doctor_id;
    if (filter.date !== undefined) query.appointment_date = filter.date;
    if (filter.status !== undefined) query.status = filter.status;

    const docs = await Appointment.find(query)
      .sort({ appointment_date: 1, time_start: 1 })
      .lean<IAppointment[]>();
    return docs.map(toAppointment);
  }

  async withDoctorDay<T>(
    doctorId: string,
    date: string,
    work: (tx: BookingTransaction) => Promise<T>
  ): Promise<T> {
    await this.ensureLockDocument(doctorId, date);

    return mongoose.connection.transaction(async (session) => {
      // Every booking for this doctor/day writes this document first, so
      // concurrent transactions hit a write conflict and get retried.
      await DoctorScheduleLock.updateOne(
        { doctor_id: doctorId, appointment_date: date },
        { $inc: { version: 1 } },
        { session }
      );
      return work(this.transactionFor(doctorId, date, session));
    });
  }

  async transitionStatus(
    appointmentId: string,
    from: AppointmentStatus,
    patch: StatusPatch,
    history: IAppointmentHistory
  ): Promise<IAppointment | null> {
    return mongoose.connection.transaction(async (session) => {
      const updated = await Appointment.findOneAndUpdate(
        { appointment_id: appointmentId, status: from },
        { $set: patch },
        { new: true, session }
      ).lean<IAppointment>();
      if (!updated) return null;

      await AppointmentHistory.create([history], { session });
      return toAppointment(updated);
    });
  }

  private transactionFor(doctorId: string, date: string, session: ClientSession): BookingTransaction {
    return {
      listActiveAppointments: async () => {
        const docs = await Appointment.find(activeFilter(doctorId, date))
          .session(session)
          .lean<IAppointment[]>();
        return docs.map(toAppointment);
      },
      insertAppointment: async (appointment) => {
        await Appointment.create([appointment], { session });
      },
      appendHistory: async (entry) => {
        await AppointmentHistory.create([entry], { session });
      },
    };
  }

  // Upserting inside the transaction would race on the unique index for a
  // brand-new doctor/day, so the document is created up front.
  private async ensureLockDocument(doctorId: string, date: string): Promise<void> {
    try {
      await DoctorScheduleLock.updateOne(
        { doctor_id: doctorId, appointment_date: date },
        { $setOnInsert: { version: 0 } },
        { upsert: true }
      );
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
    }
  }
}
