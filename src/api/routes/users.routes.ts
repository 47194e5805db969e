/**
 * User Routes
 *
 * Endpoints:
 * - POST   /users/      - Create user (201)
 * - GET    /users/      - List users, ?skip&limit (200)
 * - GET    /users/:id   - Get user (200, 404)
 * - PUT    /users/:id   - Partial update (200, 404)
 * - PATCH  /users/:id   - Partial update (200, 404)
 * - DELETE /users/:id   - Delete user (204, 404)
 *
 * Records are rendered with snake_case keys and ISO timestamps.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../../utils/errors.js';
import {
  createUserSchema,
  updateUserSchema,
  type UpdateUserInput,
  type UserRecord,
  type UserRegistry,
} from '../../services/users/index.js';

// =============================================================================
// Validation Schemas
// =============================================================================

const updateUserBodySchema = updateUserSchema
  .omit({ isActive: true })
  .extend({ is_active: z.boolean().optional() });

/**
 * Plain decimal integers only; rejects "", " 1", "0x1", "1e0" and "1.0"
 */
const integerStringSchema = z
  .string()
  .regex(/^-?\d+$/, 'Must be an integer')
  .transform(Number);

const listUsersQuerySchema = z.object({
  skip: integerStringSchema.optional(),
  limit: integerStringSchema.optional(),
});

const userIdParamSchema = z.object({
  id: integerStringSchema,
});

// =============================================================================
// Response Shape
// =============================================================================

export interface UserResponse {
  id: number;
  name: string;
  email: string;
  age: number;
  created_at: string;
  is_active: boolean;
}

export function toUserResponse(user: UserRecord): UserResponse {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    age: user.age,
    created_at: user.createdAt.toISOString(),
    is_active: user.isActive,
  };
}

// =============================================================================
// Helper Functions
// =============================================================================

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

function parseUserId(req: Request): number {
  return parseOrThrow(userIdParamSchema, req.params).id;
}

// =============================================================================
// Route Factory
// =============================================================================

/**
 * Create user routes bound to a registry
 */
export function createUsersRouter(registry: UserRegistry): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const input = parseOrThrow(createUserSchema, req.body);
    const user = registry.create(input);
    res.status(201).json(toUserResponse(user));
  });

  router.get('/', (req: Request, res: Response) => {
    const { skip, limit } = parseOrThrow(listUsersQuerySchema, req.query);
    const users = registry.list({ skip, limit });
    res.json(users.map(toUserResponse));
  });

  router.get('/:id', (req: Request, res: Response) => {
    const user = registry.get(parseUserId(req));
    res.json(toUserResponse(user));
  });

  const updateHandler = (req: Request, res: Response) => {
    const id = parseUserId(req);
    const { is_active, ...fields } = parseOrThrow(updateUserBodySchema, req.body ?? {});
    const patch: UpdateUserInput = is_active === undefined ? fields : { ...fields, isActive: is_active };
    const user = registry.update(id, patch);
    res.json(toUserResponse(user));
  };

  router.put('/:id', updateHandler);
  router.patch('/:id', updateHandler);

  router.delete('/:id', (req: Request, res: Response) => {
    registry.delete(parseUserId(req));
    res.status(204).end();
  });

  return router;
}
