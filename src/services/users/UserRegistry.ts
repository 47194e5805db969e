/**
 * UserRegistry - In-memory user store
 *
 * Holds user records for the lifetime of the process:
 * - Identifiers are assigned here, monotonically from 1, and never reused
 * - Email is a uniqueness key across all records
 * - Updates are merge-patches: only supplied fields change
 *
 * Every operation is synchronous, so the uniqueness scan and the write that
 * follows it run as one step on the event loop.
 */

import { createChildLogger, type Logger } from '../../utils/logger.js';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors.js';
import {
  createUserSchema,
  updateUserSchema,
  type CreateUserInput,
  type UpdateUserInput,
} from './schemas.js';
import {
  DEFAULT_LIST_LIMIT,
  DEFAULT_LIST_SKIP,
  type ListUsersQuery,
  type UserRecord,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface UserRegistryOptions {
  /** Clock used to stamp createdAt */
  now?: () => Date;
  logger?: Logger;
}

const EMAIL_CONFLICT_MESSAGE = 'Email already registered';
const USER_NOT_FOUND_MESSAGE = 'User not found';

// =============================================================================
// UserRegistry Class
// =============================================================================

export class UserRegistry {
  private readonly users = new Map<number, UserRecord>();
  private nextId = 1;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: UserRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createChildLogger({ component: 'user-registry' });
  }

  /** Number of records currently held */
  get size(): number {
    return this.users.size;
  }

  create(input: CreateUserInput): UserRecord {
    const parsed = createUserSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    const { name, email, age } = parsed.data;

    this.assertEmailAvailable(email);

    const user: UserRecord = {
      id: this.nextId,
      name,
      email,
      age,
      createdAt: this.now(),
      isActive: true,
    };
    this.users.set(user.id, user);
    this.nextId += 1;

    this.logger.info({ userId: user.id }, 'User created');
    return snapshot(user);
  }

  /**
   * Insertion-ordered window of records. Negative skip counts as zero; a
   * non-positive limit yields nothing.
   */
  list(query: ListUsersQuery = {}): UserRecord[] {
    const skip = Math.max(query.skip ?? DEFAULT_LIST_SKIP, 0);
    const limit = Math.max(query.limit ?? DEFAULT_LIST_LIMIT, 0);

    return Array.from(this.users.values())
      .slice(skip, skip + limit)
      .map(snapshot);
  }

  get(id: number): UserRecord {
    return snapshot(this.require(id));
  }

  update(id: number, patch: UpdateUserInput): UserRecord {
    const parsed = updateUserSchema.safeParse(patch);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    const user = this.require(id);
    const { name, email, age, isActive } = parsed.data;

    if (email !== undefined) {
      this.assertEmailAvailable(email, id);
    }

    if (name !== undefined) user.name = name;
    if (email !== undefined) user.email = email;
    if (age !== undefined) user.age = age;
    if (isActive !== undefined) user.isActive = isActive;

    this.logger.info({ userId: id, fields: Object.keys(parsed.data) }, 'User updated');
    return snapshot(user);
  }

  delete(id: number): void {
    if (!this.users.delete(id)) {
      throw new NotFoundError('User', USER_NOT_FOUND_MESSAGE);
    }
    this.logger.info({ userId: id }, 'User deleted');
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private require(id: number): UserRecord {
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError('User', USER_NOT_FOUND_MESSAGE);
    }
    return user;
  }

  /**
   * Linear scan for a colliding email, ignoring the record being updated
   */
  private assertEmailAvailable(email: string, excludeId?: number): void {
    for (const existing of this.users.values()) {
      if (existing.id !== excludeId && existing.email === email) {
        throw new ConflictError(EMAIL_CONFLICT_MESSAGE, 'email', 'EMAIL_ALREADY_REGISTERED');
      }
    }
  }
}

function snapshot(user: UserRecord): UserRecord {
  return { ...user, createdAt: new Date(user.createdAt.getTime()) };
}
