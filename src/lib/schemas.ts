// src/lib/schemas.ts
import { z } from 'zod';
import { InvalidInputError } from './errors';

export const BirthInputSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, 'expected HH:MM or HH:MM:SS'),
  timezone: z.string().trim().min(1).nullish(),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  ayanamsa: z.number().finite().min(0).max(30).optional(),
});
export type BirthInput = z.infer<typeof BirthInputSchema>;

export const PositionInputSchema = z.object({
  longitude: z.number().finite(),
  speed: z.number().finite(),
});

/** Valida l'input di nascita; il primo problema diventa un InvalidInputError. */
export function parseBirthInput(raw: unknown): BirthInput {
  const parsed = BirthInputSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  throw new InvalidInputError(issue?.message ?? 'invalid birth input', issue?.path.join('.') || null);
}
