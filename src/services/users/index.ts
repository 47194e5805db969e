export { UserRegistry, type UserRegistryOptions } from './UserRegistry.js';
export {
  createUserSchema,
  updateUserSchema,
  type CreateUserInput,
  type UpdateUserInput,
} from './schemas.js';
export {
  DEFAULT_LIST_LIMIT,
  DEFAULT_LIST_SKIP,
  type ListUsersQuery,
  type UserRecord,
} from './types.js';
