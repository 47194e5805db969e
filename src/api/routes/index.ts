/**
 * API Routes Index
 *
 * Re-exports the route factories mounted by the server.
 */

export { createPublicRouter, type PublicRouterOptions } from './public.routes.js';
export { createUsersRouter, toUserResponse, type UserResponse } from './users.routes.js';
