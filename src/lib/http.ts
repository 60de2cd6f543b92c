// lib/http.ts
// Response envelope shared by every route: { ok, data } / { ok: false, error }.
import type { Response } from "express";

export type ErrorCode =
  | "E_BAD_INPUT"
  | "E_EXTRACT"
  | "E_INCOMPLETE"
  | "E_UNSUPPORTED_INTENT"
  | "E_NO_CALENDAR"
  | "E_CALENDAR";

export function sendOk<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ ok: true, data });
}

export function sendErr(
  res: Response,
  code: ErrorCode,
  message: string,
  details?: unknown,
  status = 400
) {
  return res.status(status).json({
    ok: false,
    error: { code, message, ...(details !== undefined ? { details } : {}) },
  });
}
