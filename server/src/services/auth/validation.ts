// src/services/auth/validation.ts
import { z } from "zod";
import { parseWith } from "../../utils/validation";
import type { LoginCredentials } from "./types";

const LoginSchema = z.object({
  email: z.string().trim().min(1, "email is required").max(254),
  password: z.string().min(1, "password is required").max(256),
});

const RefreshTokenSchema = z.object({
  refresh_token: z.string().min(1, "refresh_token is required"),
});

const VerifySchema = z.object({
  token: z.string().min(1, "token is required"),
});

export function parseLoginCredentials(input: unknown): LoginCredentials {
  return parseWith(LoginSchema, input, "email and password required");
}

export function parseRefreshToken(input: unknown): string {
  return parseWith(RefreshTokenSchema, input, "refresh_token required").refresh_token;
}

export function parseVerifyToken(input: unknown): string {
  return parseWith(VerifySchema, input, "token required").token;
}
