/**
 * Framework
 *
 * Server-rendered web application layer for Node.js: HTTP, routing,
 * middleware, data, auth, caching, views, configuration and telemetry.
 *
 * @module framework
 */

// Application
export { Application, createApp, createContext, type ApplicationOptions, type ErrorHandler } from './app.ts';

// HTTP/Server
export {
  Server,
  ResponseBuilder,
  readForm,
  getCookie,
  parseCookies,
  mimeTypeFor,
  type Context,
  type Middleware,
  type Next,
  type RouteHandler,
  type ServerOptions,
  type FormBody,
  type UploadedFile,
} from './http/mod.ts';

// Middleware
export { MiddlewarePipeline, conditional, forPath, forMethods, requestLoggingMiddleware } from './middleware/mod.ts';

// Router
export { Router, buildUrl, type RouteDefinition, type RouteMatch } from './router/mod.ts';

// ORM/Data
export {
  KVStore,
  AtomicOperation,
  Query,
  query,
  Paginator,
  type KvKey,
  type KvEntry,
  type Page,
  type QueryResult,
} from './orm/mod.ts';

// Auth
export {
  Auth,
  Session,
  getAuth,
  getUser,
  getSession,
  createAuthMiddleware,
  createSessionMiddleware,
  hashPassword,
  verifyPassword,
  type AuthOptions,
  type AuthUser,
  type SessionOptions,
} from './auth/mod.ts';

// Cache
export { Cache, type CacheOptions, type CacheStats } from './cache/mod.ts';

// View
export { SafeHtml, html, escape, raw, when, each, linebreaks } from './view/mod.ts';

// Configuration
export { Config, ConfigError, loadConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export { Logger, getLogger, setLogger, type LogEntry, type LogLevel } from './telemetry/mod.ts';
