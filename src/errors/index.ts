/**
 * Error Module Exports
 */

export * from './ApiError';
export { ConfigurationError } from './ConfigurationError';
export { errorHandler, asyncHandler, notFoundHandler } from './errorHandler';
