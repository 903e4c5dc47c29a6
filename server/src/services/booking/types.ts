// src/services/booking/types.ts
import type { AppointmentStatus, IAppointment } from "../../models/Appointments";
import type { IAppointmentHistory } from "../../models/AppointmentHistory";
import type { IDoctor } from "../../models/Doctors";
import type { IDoctorAvailability } from "../../models/DoctorAvailability";

/** Statuses that still hold their slot. */
export const ACTIVE_STATUSES: readonly AppointmentStatus[] = ["scheduled", "completed", "no_show"];

export type TargetStatus = Exclude<AppointmentStatus, "scheduled">;

export const ALLOWED_TRANSITIONS: Record<AppointmentStatus, readonly TargetStatus[]> = {
  scheduled: ["completed", "cancelled", "no_show"],
  completed: [],
  cancelled: [],
  no_show: [],
};

export interface FreeInterval {
  start: string; // HH:mm
  end: string; // HH:mm, exclusive
}

export type StatusPatch = Pick<IAppointment, "status" | "updated_at"> &
  Partial<
    Pick<IAppointment, "cancelled_at" | "cancelled_by" | "cancellation_reason" | "completed_at" | "no_show_at">
  >;

/** Reads and writes scoped to one doctor's day, run atomically by the store. */
export interface BookingTransaction {
  listActiveAppointments(): Promise<IAppointment[]>;
  insertAppointment(appointment: IAppointment): Promise<void>;
  appendHistory(entry: IAppointmentHistory): Promise<void>;
}

/** Narrows listAppointments; unset fields match everything. */
export interface AppointmentFilter {
  patient_id?: string;
  doctor_id?: string;
  date?: string;
  status?: AppointmentStatus;
}

export interface BookingStore {
  findDoctor(doctorId: string): Promise<IDoctor | null>;
  listAvailability(doctorId: string, dayOfWeek: number): Promise<IDoctorAvailability[]>;
  listActiveAppointments(doctorId: string, date: string): Promise<IAppointment[]>;
  findAppointment(appointmentId: string): Promise<IAppointment | null>;
  /** Ordered by date, then start time. */
  listAppointments(filter: AppointmentFilter): Promise<IAppointment[]>;
  /**
   * Runs `work` so that no other withDoctorDay call for the same doctor and
   * date interleaves with it. A rejection from `work` discards its writes.
   */
  withDoctorDay<T>(doctorId: string, date: string, work: (tx: BookingTransaction) => Promise<T>): Promise<T>;
  /**
   * Compare-and-set on status. Returns null when the appointment is no longer
   * in `from`; the history entry is written only when the update applies.
   */
  transitionStatus(
    appointmentId: string,
    from: AppointmentStatus,
    patch: StatusPatch,
    history: IAppointmentHistory
  ): Promise<IAppointment | null>;
}

export interface AppointmentNotifier {
  appointmentBooked(appointment: IAppointment): Promise<void>;
  appointmentStatusChanged(appointment: IAppointment, previous: AppointmentStatus): Promise<void>;
}
