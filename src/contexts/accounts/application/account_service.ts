/**
 * Account Service
 *
 * Sign-up and credential checks for the user directory.
 */

import { z } from 'zod';
import { hashPassword, type AuthUser, type StoredCredentials } from '@framework/auth/mod.ts';
import type { Logger } from '@framework/telemetry/logger.ts';
import {
  ConflictError,
  ValidationError,
  validationErrorFrom,
} from '../../../shared/application/errors.ts';
import { User, USERNAME_MAX_LENGTH, USERNAME_PATTERN } from '../domain/user.ts';
import type { UserRepository } from '../infrastructure/user_repository.ts';

export const PASSWORD_MIN_LENGTH = 8;

const EMAIL = z.string().email();

/**
 * Sign-up form, keyed by the form's field names
 */
export const SignupForm = z
  .object({
    first_name: z.string().trim().max(150).default(''),
    last_name: z.string().trim().max(150).default(''),
    username: z
      .string({ required_error: 'This field is required.' })
      .trim()
      .min(1, 'This field is required.')
      .max(USERNAME_MAX_LENGTH, `Ensure this value has at most ${USERNAME_MAX_LENGTH} characters.`)
      // An empty value is already reported as required
      .refine(
        (value) => value === '' || USERNAME_PATTERN.test(value),
        'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.'
      ),
    email: z
      .string()
      .trim()
      .refine((value) => value === '' || EMAIL.safeParse(value).success, 'Enter a valid email address.')
      .default(''),
    password1: z
      .string({ required_error: 'This field is required.' })
      .min(PASSWORD_MIN_LENGTH, `This password is too short. It must contain at least ${PASSWORD_MIN_LENGTH} characters.`)
      .refine((value) => !/^\d+$/.test(value), 'This password is entirely numeric.'),
    password2: z.string({ required_error: 'This field is required.' }),
  })
  .refine((form) => form.password1 === form.password2, {
    message: 'The two password fields didn’t match.',
    path: ['password2'],
  });

export class AccountService {
  constructor(
    private users: UserRepository,
    private logger: Logger
  ) {}

  /**
   * Register a new user. `ValidationError` for bad input or a taken username.
   */
  async signup(input: Record<string, unknown>): Promise<User> {
    const parsed = SignupForm.safeParse(input);
    if (!parsed.success) {
      throw validationErrorFrom(parsed.error);
    }
    const form = parsed.data;

    if (await this.users.findByUsername(form.username)) {
      throw ValidationError.field('username', 'A user with that username already exists.');
    }

    const user = User.create({
      id: await this.users.nextId(),
      username: form.username,
      email: form.email,
      firstName: form.first_name,
      lastName: form.last_name,
      passwordHash: await hashPassword(form.password1),
    });

    try {
      await this.users.insert(user);
    } catch (error) {
      if (error instanceof ConflictError) {
        throw ValidationError.field('username', 'A user with that username already exists.');
      }
      throw error;
    }

    this.logger.info('User signed up', { userId: user.id, username: user.username });
    return user;
  }

  /**
   * Credentials lookup for `Auth.authenticate`
   */
  async findCredentials(username: string): Promise<StoredCredentials | null> {
    const user = await this.users.findByUsername(username.trim());
    return user ? { id: user.id, passwordHash: user.passwordHash } : null;
  }

  /**
   * User loader for the auth middleware
   */
  async loadUser(id: number): Promise<AuthUser | null> {
    const user = await this.users.findById(id);
    return user ? user.toAuthUser() : null;
  }
}
