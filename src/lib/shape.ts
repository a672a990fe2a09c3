/**
 * DevGate — Payload Shaping
 *
 * zod building blocks for reading loosely structured upstream JSON.
 * Optional fields resolve to a fixed default when the key is absent or
 * null; required fields fail the whole payload with a ShapeError.
 */

import { z } from 'zod';
import { ShapeError, formatZodIssues } from './errors';

export const stringOr = <T extends string | null>(fallback: T) =>
  z
    .string()
    .nullish()
    .transform((value): string | T => value ?? fallback);

export const numberOr = <T extends number | null>(fallback: T) =>
  z
    .number()
    .nullish()
    .transform((value): number | T => value ?? fallback);

export const booleanOr = (fallback: boolean) =>
  z
    .boolean()
    .nullish()
    .transform(value => value ?? fallback);

export const stringListOr = (fallback: string[] = []) =>
  z
    .array(z.string())
    .nullish()
    .transform(value => value ?? fallback);

/** Items of a list envelope, parsed one by one afterwards. */
export const unknownListOr = () =>
  z
    .array(z.unknown())
    .nullish()
    .transform((value): unknown[] => value ?? []);

export const unknownList = z.array(z.unknown());

/** Canonical decimal id from a path or query string, within the safe integer range. */
export const numericId = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, 'must be a decimal id')
  .transform(Number)
  .refine(Number.isSafeInteger, 'is out of range');

/**
 * Parse an upstream payload, converting validation failures into a
 * ShapeError tagged with the upstream's display label.
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ShapeError(label, [formatZodIssues(result.error)]);
  }
  return result.data;
}

export function parseEach<S extends z.ZodTypeAny>(
  schema: S,
  items: readonly unknown[],
  label: string
): Array<z.output<S>> {
  return items.map(item => parsePayload(schema, item, label));
}

/** Keep the first `cap` entries. Filters must run before this. */
export function take<T>(items: readonly T[], cap: number): T[] {
  return items.slice(0, cap);
}
