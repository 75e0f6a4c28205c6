import { NextResponse } from 'next/server';
import type { z } from 'zod';
import { ValidationError, getErrorMessage, getErrorStatus } from '@/services/errors';

export const jsonError = (message: string, status = 500) => {
  return NextResponse.json({ error: message }, { status });
};

/** Maps any thrown value onto `{ error }` with the status of its error class. */
export const errorResponse = (error: unknown, action: string) => {
  const status = getErrorStatus(error);
  if (status >= 500) {
    console.error(`[api] ${action} failed:`, error);
  }
  return jsonError(getErrorMessage(error), status);
};

/**
 * Reads the request body as JSON and validates it. An empty body is read as `{}`.
 */
export const parseJsonBody = async <S extends z.ZodTypeAny>(
  request: Request,
  schema: S,
): Promise<z.infer<S>> => {
  const text = await request.text();

  let json: unknown = {};
  if (text.trim()) {
    try {
      json = JSON.parse(text);
    } catch {
      throw new ValidationError('Request body must be valid JSON');
    }
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue?.path.join('.');
    throw new ValidationError(field ? `Invalid ${field}: ${issue.message}` : 'Invalid request body');
  }
  return result.data;
};
