/**
 * HTTP server package.
 *
 * @packageDocumentation
 */

export {
  createHttpApp,
  statusForSpecError,
  INVALID_JSON_MESSAGE,
  UNSUPPORTED_MEDIA_TYPE_MESSAGE,
  INTERNAL_ERROR_MESSAGE,
  NOT_FOUND_MESSAGE,
  type HttpAppDeps,
  type HttpAppEnv,
} from './app.js';
export { startHttpServer, type StartHttpServerOptions } from './server.js';
