/**
 * URL Pattern Utilities
 */

export type PatternParams = Record<string, string>;

/**
 * Build a URL from a route path and parameters.
 * Regex constraints and modifiers on a parameter (`:id(\\d+)`, `:path+`) are dropped.
 */
export function buildUrl(
  pattern: string,
  params: PatternParams,
  query?: Record<string, string | string[]>
): string {
  let url = pattern.replace(/:(\w+)(\([^)]*\))?([+*?])?/g, (whole, key: string, _constraint, modifier) => {
    const value = params[key];
    if (value === undefined) return whole;
    // Multi-segment params keep their slashes
    return modifier === '+' || modifier === '*'
      ? value.split('/').map(encodeURIComponent).join('/')
      : encodeURIComponent(value);
  });

  if (query && Object.keys(query).length > 0) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      for (const v of Array.isArray(value) ? value : [value]) {
        searchParams.append(key, v);
      }
    }
    url += '?' + searchParams.toString();
  }

  return url;
}

/**
 * List the parameter names in a route path
 */
export function parsePathParams(pattern: string): string[] {
  return Array.from(pattern.matchAll(/:(\w+)/g), (match) => match[1]);
}
