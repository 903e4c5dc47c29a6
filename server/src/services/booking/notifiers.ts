// src/services/booking/notifiers.ts
import { format } from "date-fns";
import type { AppointmentStatus, IAppointment } from "../../models/Appointments";
import { APPOINTMENT_UPDATED_EVENT, broadcast } from "../../socket";
import { lookupPushToken, sendPushNotification, type PushMessage, type PushTokenLookup } from "../../utils/pushNotifications";
import { parseCalendarDate } from "../../utils/time";
import type { AppointmentNotifier } from "./types";

function displayDate(date: string): string {
  const parsed = parseCalendarDate(date);
  return parsed ? format(parsed, "EEEE, MMMM d, yyyy") : date;
}

export function bookedMessage(appointment: IAppointment): PushMessage {
  return {
    title: "Appointment Confirmed",
    body: `Your appointment on ${displayDate(appointment.appointment_date)} at ${appointment.time_start} has been confirmed.`,
    data: {
      appointmentId: appointment.appointment_id,
      status: appointment.status,
      date: appointment.appointment_date,
      timeStart: appointment.time_start,
      timeEnd: appointment.time_end,
    },
  };
}

// Only cancellations are pushed; completion and no-show are staff bookkeeping.
export function statusMessage(appointment: IAppointment): PushMessage | null {
  if (appointment.status !== "cancelled") return null;
  const reason = appointment.cancellation_reason ? ` Reason: ${appointment.cancellation_reason}` : "";
  return {
    title: "Appointment Canceled",
    body: `Your appointment on ${displayDate(appointment.appointment_date)} at ${appointment.time_start} has been canceled.${reason}`,
    data: {
      appointmentId: appointment.appointment_id,
      status: appointment.status,
      date: appointment.appointment_date,
    },
  };
}

export function createPushNotifier(endpoint: string, lookup: PushTokenLookup = lookupPushToken): AppointmentNotifier {
  const push = async (appointment: IAppointment, message: PushMessage | null) => {
    if (!message) return;
    const result = await sendPushNotification(endpoint, appointment.patient_id, message, lookup);
    if (!result.success) {
      console.warn(`Push notification failed for appointment ${appointment.appointment_id}:`, result.error);
    } else {
      console.log(`Push notification sent successfully for appointment ${appointment.appointment_id}`);
    }
  };

  return {
    appointmentBooked: (appointment) => push(appointment, bookedMessage(appointment)),
    appointmentStatusChanged: (appointment) => push(appointment, statusMessage(appointment)),
  };
}

export function createSocketNotifier(
  emit: (event: string, payload: unknown) => void = broadcast
): AppointmentNotifier {
  return {
    appointmentBooked: async (appointment) => {
      emit(APPOINTMENT_UPDATED_EVENT, { type: "booked", appointment });
    },
    appointmentStatusChanged: async (appointment, previous: AppointmentStatus) => {
      emit(APPOINTMENT_UPDATED_EVENT, { type: "status_changed", appointment, previous_status: previous });
    },
  };
}

/** Fans out to every notifier; one failing channel does not stop the others. */
export function composeNotifiers(...notifiers: AppointmentNotifier[]): AppointmentNotifier {
  const fanOut = async (label: string, send: (n: AppointmentNotifier) => Promise<void>) => {
    const results = await Promise.allSettled(notifiers.map((n) => send(n)));
    results.forEach((result) => {
      if (result.status === "rejected") {
        console.error(`Notifier failed during ${label}:`, result.reason);
      }
    });
  };

  return {
    appointmentBooked: (appointment) => fanOut("appointmentBooked", (n) => n.appointmentBooked(appointment)),
    appointmentStatusChanged: (appointment, previous) =>
      fanOut("appointmentStatusChanged", (n) => n.appointmentStatusChanged(appointment, previous)),
  };
}
