/**
 * Authentication Layer
 *
 * Sessions, sign-in state and password storage.
 */

export {
  Auth,
  getAuth,
  getUser,
  createAuthMiddleware,
  type AuthOptions,
  type AuthUser,
  type StoredCredentials,
} from './auth.ts';
export { Session, getSession, createSessionMiddleware, type SessionData, type SessionOptions } from './session.ts';
export { hashPassword, verifyPassword } from './password.ts';
