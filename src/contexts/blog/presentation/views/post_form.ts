/**
 * Create and edit post form
 */

import { html, each, type SafeHtml } from '@framework/view/html.ts';
import type { AuthUser } from '@framework/auth/auth.ts';
import { fieldErrors, layout } from '../../../../shared/presentation/layout.ts';
import type { Group } from '../../domain/group.ts';

export interface PostFormValues {
  text: string;
  group: string;
}

export interface PostFormView {
  user: AuthUser;
  groups: Group[];
  values: PostFormValues;
  errors: Record<string, string[]>;
  /** Set when editing an existing post */
  postId?: number;
}

export function postFormPage(view: PostFormView): SafeHtml {
  const isEdit = view.postId !== undefined;
  const title = isEdit ? 'Edit post' : 'New post';
  const action = isEdit ? `/posts/${view.postId}/edit/` : '/create/';

  return layout({
    title,
    user: view.user,
    content: html`
      <h1>${title}</h1>
      ${fieldErrors(view.errors, '__all__')}
      <form method="post" action="${action}" enctype="multipart/form-data">
        <p>
          <label for="id_text">Text</label>
          <textarea name="text" id="id_text" rows="10">${view.values.text}</textarea>
          ${fieldErrors(view.errors, 'text')}
        </p>
        <p>
          <label for="id_group">Group</label>
          <select name="group" id="id_group">
            <option value="">---------</option>
            ${each(
              view.groups,
              (group) =>
                html`<option value="${group.id}"${String(group.id) === view.values.group ? html` selected` : ''}>${group.title}</option>`
            )}
          </select>
          ${fieldErrors(view.errors, 'group')}
        </p>
        ${isEdit
          ? html``
          : html`<p>
              <label for="id_image">Image</label>
              <input type="file" name="image" id="id_image" accept="image/*" />
              ${fieldErrors(view.errors, 'image')}
            </p>`}
        <button type="submit">${isEdit ? 'Save' : 'Publish'}</button>
      </form>`,
  });
}
