import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';

export const jsonOk = <T>(c: Context, data: T, status: ContentfulStatusCode = 200) =>
  c.json({ success: true, data }, status);

export const jsonError = (c: Context, code: string, message: string, status: ContentfulStatusCode = 400) =>
  c.json({ success: false, error: { code, message } }, status);

/** Validator hook answering a failed parse with the error envelope. */
export const rejectInvalid =
  (code: string, message: string) =>
  <R extends { success: boolean }>(result: R, c: Context) => {
    if (!result.success) return jsonError(c, code, message, 400);
  };

export const invalidParams = rejectInvalid('INVALID_PARAMS', 'Invalid path parameters.');
export const invalidHeaders = rejectInvalid('INVALID_HEADERS', 'Missing or invalid caller headers.');
export const invalidBody = rejectInvalid('INVALID_BODY', 'Invalid request body.');

export const projectParamSchema = z.object({
  projectId: z.string().min(1),
});

// Callers are authenticated and authorized before requests reach this service.
export const callerHeadersSchema = z.object({
  'x-user-id': z.string().min(1).optional(),
  'x-client-id': z.string().min(1).optional(),
});

export const authorHeadersSchema = callerHeadersSchema.extend({
  'x-user-id': z.string().min(1),
});
