/**
 * Sign-up, login and logged-out pages
 */

import { html, type SafeHtml } from '@framework/view/html.ts';
import type { AuthUser } from '@framework/auth/auth.ts';
import { fieldErrors, layout } from '../../../../shared/presentation/layout.ts';

export interface SignupValues {
  first_name: string;
  last_name: string;
  username: string;
  email: string;
}

export const EMPTY_SIGNUP: SignupValues = { first_name: '', last_name: '', username: '', email: '' };

type Errors = Record<string, string[]>;

function textInput(name: string, label: string, value: string, errors: Errors, type = 'text'): SafeHtml {
  return html`
    <p>
      <label for="id_${name}">${label}</label>
      <input type="${type}" name="${name}" id="id_${name}" value="${value}" />
      ${fieldErrors(errors, name)}
    </p>`;
}

function passwordInput(name: string, label: string, errors: Errors): SafeHtml {
  return html`
    <p>
      <label for="id_${name}">${label}</label>
      <input type="password" name="${name}" id="id_${name}" />
      ${fieldErrors(errors, name)}
    </p>`;
}

export function signupPage(user: AuthUser | null, values: SignupValues, errors: Errors): SafeHtml {
  return layout({
    title: 'Sign up',
    user,
    content: html`
      <h1>Sign up</h1>
      ${fieldErrors(errors, '__all__')}
      <form method="post" action="/auth/signup/">
        ${textInput('first_name', 'First name', values.first_name, errors)}
        ${textInput('last_name', 'Last name', values.last_name, errors)}
        ${textInput('username', 'Username', values.username, errors)}
        ${textInput('email', 'Email address', values.email, errors, 'email')}
        ${passwordInput('password1', 'Password', errors)}
        ${passwordInput('password2', 'Password confirmation', errors)}
        <button type="submit">Sign up</button>
      </form>`,
  });
}

export function loginPage(user: AuthUser | null, username: string, next: string, error?: string): SafeHtml {
  return layout({
    title: 'Log in',
    user,
    content: html`
      <h1>Log in</h1>
      ${error ? html`<ul class="errors"><li>${error}</li></ul>` : ''}
      <form method="post" action="/auth/login/">
        <input type="hidden" name="next" value="${next}" />
        ${textInput('username', 'Username', username, {})}
        ${passwordInput('password', 'Password', {})}
        <button type="submit">Log in</button>
      </form>
      <p>No account yet? <a href="/auth/signup/">Sign up</a></p>`,
  });
}

export function loggedOutPage(): SafeHtml {
  return layout({
    title: 'Logged out',
    user: null,
    content: html`
      <h1>You have logged out</h1>
      <p><a href="/auth/login/">Log in again</a></p>`,
  });
}
