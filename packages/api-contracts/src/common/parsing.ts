import { z } from 'zod';

/** Accepts real booleans as well as the string forms that arrive in query strings and multipart fields. */
export const BooleanishSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

export const PositiveIntSchema = z.coerce.number().int().positive();
