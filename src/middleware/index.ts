export { pipeline, ok } from './pipeline.js';
export type { CommandInput, CommandResult, Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler, UNEXPECTED_ERROR_MESSAGE } from './error-handler.js';
export { validateArgs } from './validate-args.js';
export type { ArgsSchema } from './validate-args.js';
export { createLoggingMiddleware } from './logging.js';
