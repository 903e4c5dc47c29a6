import mongoose from "mongoose";
import { createServer } from "http";
import { Server } from "socket.io";

import { createApp } from "./app";
import { loadConfigFromDotenv } from "./config/env";
import { initSocket } from "./socket";
import { AuthService } from "./services/auth/authService";
import { MongoAuthStore } from "./services/auth/mongoAuthStore";
import { TokenService } from "./services/auth/tokens";
import { BookingEngine } from "./services/booking/bookingEngine";
import { MongoBookingStore } from "./services/booking/mongoBookingStore";
import { composeNotifiers, createPushNotifier, createSocketNotifier } from "./services/booking/notifiers";

const config = loadConfigFromDotenv();

const auth = new AuthService({
  store: new MongoAuthStore(),
  tokens: new TokenService({
    secret: config.auth.jwtSecret,
    accessTtlSeconds: config.auth.accessTokenTtlMinutes * 60,
    refreshTtlSeconds: config.auth.refreshTokenTtlDays * 24 * 60 * 60,
  }),
  lockout: {
    maxFailedLogins: config.auth.maxFailedLogins,
    lockoutMinutes: config.auth.lockoutMinutes,
  },
});

const booking = new BookingEngine({
  store: new MongoBookingStore(),
  notifier: composeNotifiers(createPushNotifier(config.expoPushEndpoint), createSocketNotifier()),
});

const app = createApp({ auth, booking }, { corsOrigin: config.corsOrigin });
const httpServer = createServer(app);

// Setup socket.io
const io = new Server(httpServer, {
  cors: {
    origin: config.corsOrigin,
  },
});
initSocket(io);

// Connect DB, then start accepting requests
mongoose
  .connect(config.mongoUri)
  .then(() => {
    console.log("✅ MongoDB connected");
    httpServer.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
    });
  })
  .catch((err) => {
    console.error("❌ MongoDB connection error:", err);
    process.exitCode = 1;
  });
