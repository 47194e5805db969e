/**
 * User input schemas
 *
 * Shared by the registry (which enforces them on every write) and the HTTP
 * layer (which parses request bodies with them).
 */

import { z } from 'zod';

const NAME_MAX_LENGTH = 100;
const AGE_MIN = 0;
const AGE_MAX = 150;

const nameSchema = z
  .string()
  .min(1, 'Name must not be empty')
  .max(NAME_MAX_LENGTH, `Name must be at most ${NAME_MAX_LENGTH} characters`);

const emailSchema = z.string();

const ageSchema = z
  .number()
  .int('Age must be an integer')
  .min(AGE_MIN, `Age must be at least ${AGE_MIN}`)
  .max(AGE_MAX, `Age must be at most ${AGE_MAX}`);

export const createUserSchema = z.object({
  name: nameSchema,
  email: emailSchema,
  age: ageSchema,
});

/**
 * Every field optional; an absent key leaves the stored value untouched.
 */
export const updateUserSchema = z.object({
  name: nameSchema.optional(),
  email: emailSchema.optional(),
  age: ageSchema.optional(),
  isActive: z.boolean().optional(),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
