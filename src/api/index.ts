/**
 * API Module Exports
 */

export { createApp, startServer, type AppDependencies, type RunningServer } from './server.js';
export { errorHandler, notFoundHandler, requestIdMiddleware } from './middleware.js';
export { createPublicRouter, createUsersRouter, toUserResponse, type UserResponse } from './routes/index.js';
