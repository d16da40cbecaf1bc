// REST endpoints (Fastify)
export type { ApiError, ApiResponse, RouteDependencies } from './types.js';
export type { Page, PageQuery } from './pagination.js';

export { registerErrorHandler, sendSuccess, sendError, sendNotFound } from './error-handler.js';
export { MAX_PAGE_SIZE, pageQuerySchema, slicePage, toPage } from './pagination.js';
export { registerRoutes } from './routes/index.js';
