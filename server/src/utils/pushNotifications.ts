// src/utils/pushNotifications.ts
import axios from "axios";
import { NotifToken, type INotifToken } from "../models/NotifToken";

// TypeScript interfaces for Expo push notifications
export interface ExpoPushMessage {
  to: string | string[];
  sound?: "default" | null;
  title?: string;
  body?: string;
  data?: Record<string, unknown>;
  ttl?: number;
  priority?: "default" | "normal" | "high";
}

export interface ExpoPushTicket {
  id?: string;
  status: "ok" | "error";
  message?: string;
  details?: {
    error?: "InvalidCredentials" | "MessageTooBig" | "MessageRateExceeded" | "MismatchSenderId" | "InvalidProviderToken" | "DeviceNotRegistered" | "ExpoError";
  };
}

export interface PushNotificationResult {
  success: boolean;
  tickets?: ExpoPushTicket[];
  error?: string;
  patientId: string;
}

export interface PushMessage {
  title: string;
  body: string;
  data?: Record<string, unknown>;
}

/** Resolves a patient's device token; null when none is registered. */
export type PushTokenLookup = (patientId: string) => Promise<string | null>;

export const lookupPushToken: PushTokenLookup = async (patientId) => {
  const notifToken = await NotifToken.findOne({ patient_id: patientId })
    .sort({ created_at: -1 })
    .lean<INotifToken>();
  return notifToken ? notifToken.token : null;
};

/**
 * Checks if a token is a valid Expo push token format
 */
export function isValidExpoToken(token: string): boolean {
  // Expo push tokens start with ExponentPushToken[ or ExpoPushToken[
  return /^(ExponentPushToken|ExpoPushToken)\[.+\]$/.test(token);
}

/**
 * Sends a push notification to a single patient through Expo.
 * Never throws; failures are reported in the result.
 */
export async function sendPushNotification(
  endpoint: string,
  patientId: string,
  message: PushMessage,
  lookup: PushTokenLookup = lookupPushToken
): Promise<PushNotificationResult> {
  try {
    const token = await lookup(patientId);

    if (!token) {
      console.warn(`No push token found for patient: ${patientId}`);
      return { success: false, error: "No push token found for patient", patientId };
    }

    if (!isValidExpoToken(token)) {
      console.error(`Invalid Expo push token for patient ${patientId}: ${token}`);
      return { success: false, error: "Invalid Expo push token format", patientId };
    }

    const payload: ExpoPushMessage = {
      to: token,
      sound: "default",
      title: message.title,
      body: message.body,
      ...(message.data && { data: message.data }),
    };

    const response = await axios.post<ExpoPushTicket[]>(endpoint, payload, {
      headers: {
        Accept: "application/json",
        "Accept-encoding": "gzip, deflate",
        "Content-Type": "application/json",
      },
      timeout: 10000, // 10 second timeout
    });

    const ticket = Array.isArray(response.data) ? response.data[0] : undefined;
    if (!ticket) {
      return { success: false, error: "No response data from Expo", patientId };
    }

    if (ticket.status === "error") {
      if (ticket.details?.error === "DeviceNotRegistered") {
        console.warn(`Device not registered for patient ${patientId}, token may be expired`);
      }
      return {
        success: false,
        error: ticket.message || "Unknown error from Expo",
        tickets: response.data,
        patientId,
      };
    }

    return { success: true, tickets: response.data, patientId };
  } catch (error) {
    let errorMessage = "Unknown error occurred";
    if (axios.isAxiosError(error)) {
      errorMessage = error.message || "HTTP request failed";
    } else if (error instanceof Error) {
      errorMessage = error.message;
    }
    console.error(`Error sending push notification to patient ${patientId}:`, errorMessage);
    return { success: false, error: errorMessage, patientId };
  }
}
