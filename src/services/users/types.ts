/**
 * A user held by the registry
 */
export interface UserRecord {
  /** Assigned by the registry, never reused */
  readonly id: number;
  name: string;
  /** Uniqueness key, compared case-sensitively */
  email: string;
  age: number;
  readonly createdAt: Date;
  isActive: boolean;
}

/**
 * Pagination window for listing
 */
export interface ListUsersQuery {
  skip?: number;
  limit?: number;
}

export const DEFAULT_LIST_SKIP = 0;
export const DEFAULT_LIST_LIMIT = 100;
