// src/config/env.ts
import dotenv from "dotenv";
import { z } from "zod";

export const DEV_JWT_SECRET = "dev-only-secret-change-me";

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(5000),
    MONGO_URI: z.string().default(""),
    CORS_ORIGIN: z.string().min(1).default("*"),
    JWT_SECRET: z.string().min(16, "must be at least 16 characters").default(DEV_JWT_SECRET),
    ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(60),
    REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().positive().default(7),
    MAX_FAILED_LOGINS: z.coerce.number().int().positive().default(5),
    LOCKOUT_MINUTES: z.coerce.number().int().positive().default(30),
    EXPO_PUSH_ENDPOINT: z.string().url().default("https://exp.host/--/api/v2/push/send"),
  })
  .refine((env) => env.NODE_ENV !== "production" || env.JWT_SECRET !== DEV_JWT_SECRET, {
    message: "must be set explicitly in production",
    path: ["JWT_SECRET"],
  });

export interface AppConfig {
  env: "development" | "test" | "production";
  port: number;
  mongoUri: string;
  corsOrigin: string;
  auth: AuthConfig;
  expoPushEndpoint: string;
}

export interface AuthConfig {
  jwtSecret: string;
  accessTokenTtlMinutes: number;
  refreshTokenTtlDays: number;
  maxFailedLogins: number;
  lockoutMinutes: number;
}

/**
 * Validates the process environment into an AppConfig.
 * Throws a single Error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration (${problems.join("; ")})`);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    mongoUri: e.MONGO_URI,
    corsOrigin: e.CORS_ORIGIN,
    auth: {
      jwtSecret: e.JWT_SECRET,
      accessTokenTtlMinutes: e.ACCESS_TOKEN_TTL_MINUTES,
      refreshTokenTtlDays: e.REFRESH_TOKEN_TTL_DAYS,
      maxFailedLogins: e.MAX_FAILED_LOGINS,
      lockoutMinutes: e.LOCKOUT_MINUTES,
    },
    expoPushEndpoint: e.EXPO_PUSH_ENDPOINT,
  };
}

// Reads .env into process.env, then validates.
export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
