// src/controllers/respond.ts
import { Response } from "express";
import { AppError, ValidationError, type ValidationIssue } from "../errors";

interface ErrorBody {
  success: false;
  code?: string;
  message: string;
  issues?: ValidationIssue[];
}

/**
 * Domain errors map to their own status; anything else is logged and
 * answered with a generic 500.
 */
export function sendError(res: Response, err: unknown, context: string) {
  if (err instanceof AppError) {
    const body: ErrorBody = { success: false, code: err.code, message: err.message };
    if (err instanceof ValidationError && err.issues.length > 0) {
      body.issues = err.issues;
    }
    return res.status(err.status).json(body);
  }

  console.error(`${context}:`, err);
  const body: ErrorBody = { success: false, message: "Server error" };
  return res.status(500).json(body);
}
