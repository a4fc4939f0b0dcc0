import { z } from 'zod';
import { ValidationError } from './errors';

// Lenient field shapes for model output: missing values become empty, scalars become strings

export const text = z.preprocess(
  (value) => (value === null || value === undefined ? '' : typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
  z.string()
);

export const stringList = z.preprocess((value) => {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string') return value.trim() ? [value] : [];
  return value;
}, z.array(text).transform((items) => items.map((item) => item.trim()).filter(Boolean)));

export const nullableNumber = z.preprocess((value) => {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'string') {
    const match = value.match(/-?\d+(\.\d+)?/);
    return match ? Number(match[0]) : null;
  }
  return value;
}, z.number().nullable());

export function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => (value === null || value === undefined ? [] : value), z.array(item));
}

export function objectOrEmpty<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((value) => (value === null || value === undefined ? {} : value), z.object(shape));
}

// Request validation: failures become a 400 with the flattened issues
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}
