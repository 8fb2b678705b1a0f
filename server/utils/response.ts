/**
 * HTTP response envelope
 *
 * Success: { ok: true, data: {...} }
 * Error:   { error: { code, message, context? } } (written by errorHandler)
 */

import { type Response } from "express";

export interface ApiResponse<T> {
  ok: true;
  data: T;
}

/**
 * Send success response with envelope
 */
export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  const response: ApiResponse<T> = { ok: true, data };
  res.status(statusCode).json(response);
}
