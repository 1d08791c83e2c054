import type { Request } from 'express';
import { RelayError } from 'keyrelay-core';

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** The parsed JSON body, which must be an object */
export function jsonBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RelayError('INVALID_PAYLOAD', 'request body must be a JSON object');
  }
  return { ...body };
}

export function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (!isNonEmptyString(value)) {
    throw new RelayError('INVALID_PAYLOAD', `${field} must be a non-empty string`);
  }
  return value;
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  if (body[field] === undefined) return undefined;
  return requireString(body, field);
}

export function requireNumber(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RelayError('INVALID_PAYLOAD', `${field} must be a number`);
  }
  return value;
}

export function optionalNumber(body: Record<string, unknown>, field: string): number | undefined {
  if (body[field] === undefined) return undefined;
  return requireNumber(body, field);
}
