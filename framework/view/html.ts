/**
 * HTML Utilities
 *
 * Tagged template literals for safe HTML generation.
 */

/**
 * Safe HTML content wrapper
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Escape HTML entities
 */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }

  return String(value ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Mark content as safe (no escaping)
 */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

function render(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(render).join('');
  }
  if (value === null || value === undefined || value === false) {
    return '';
  }
  return escape(value);
}

/**
 * HTML tagged template literal
 *
 * Interpolated values are escaped unless they are SafeHtml. Arrays are
 * rendered item by item; null, undefined and false render nothing.
 *
 * @example
 * const name = '<script>alert("xss")</script>';
 * html`<div>Hello, ${name}!</div>`
 * // Output: <div>Hello, &lt;script&gt;alert(&quot;xss&quot;)&lt;/script&gt;!</div>
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let result = '';

  for (let i = 0; i < strings.length; i++) {
    result += strings[i];

    if (i < values.length) {
      result += render(values[i]);
    }
  }

  return new SafeHtml(result);
}

/**
 * Conditional rendering. `content` may be a thunk so the branch is only
 * built when shown.
 */
export function when(
  condition: boolean,
  content: SafeHtml | string | (() => SafeHtml),
  otherwise?: SafeHtml | string | (() => SafeHtml)
): SafeHtml {
  const branch = condition ? content : otherwise;
  if (branch === undefined) return new SafeHtml('');
  const value = typeof branch === 'function' ? branch() : branch;
  return value instanceof SafeHtml ? value : new SafeHtml(escape(value));
}

/**
 * Map over an array and render each item
 */
export function each<T>(
  items: readonly T[],
  render: (item: T, index: number) => string | SafeHtml
): SafeHtml {
  const content = items
    .map((item, index) => {
      const result = render(item, index);
      return result instanceof SafeHtml ? result.content : escape(result);
    })
    .join('');
  return new SafeHtml(content);
}

/**
 * Escape text and turn line breaks into `<br>`
 */
export function linebreaks(text: string): SafeHtml {
  return new SafeHtml(
    text
      .split(/\r\n|\r|\n/)
      .map((line) => escape(line))
      .join('<br>')
  );
}
