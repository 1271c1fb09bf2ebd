/**
 * HTTP Layer
 *
 * Fetch-style request handling on top of node:http, plus helpers for
 * cookies, form bodies and building responses.
 */

export { Server, toRequest, writeResponse, type FetchHandler, type ServerOptions } from './server.ts';
export { parseCookies, getCookie, readForm, type FormBody, type UploadedFile } from './request.ts';
export { ResponseBuilder, serializeCookie, mimeTypeFor, type ResponseOptions } from './response.ts';
export type {
  Context,
  Middleware,
  Next,
  RouteHandler,
  HttpMethod,
  CookieOptions,
} from './types.ts';
