// @revlog/api
// tRPC API over the revision log

export { loadConfig, ConfigError, type ApiConfig } from './config.js';
export { openStorage, type Storage } from './db.js';
export {
  createServices,
  createLogger,
  type Services,
  type ServiceOverrides,
} from './services.js';
export { createRequestHandler, TRPC_ENDPOINT, type RequestHandler } from './handler.js';
export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createContext, type Context } from './trpc/context.js';
export { createCallerFactory } from './trpc/index.js';
export { errorCodeFor, toTRPCError } from './trpc/errors.js';
export {
  getAuthFromRequest,
  DEV_AUTH,
  ACTOR_HEADER,
  type AuthContext,
  type AuthResult,
} from './auth/index.js';
