import { Server, Socket } from "socket.io";

export const APPOINTMENT_UPDATED_EVENT = "appointmentUpdated";

let ioInstance: Server | null = null;

export function initSocket(io: Server) {
  ioInstance = io;

  io.on("connection", (socket: Socket) => {
    console.log("✅ Client connected:", socket.id);
    socket.on("disconnect", () => {
      console.log("❌ Client disconnected:", socket.id);
    });
  });
}

// No-op until initSocket has run.
export function broadcast(event: string, payload: unknown) {
  if (!ioInstance) return;
  try {
    ioInstance.emit(event, payload);
  } catch (err) {
    console.error(`Failed to broadcast ${event}:`, err);
  }
}
