/**
 * Presentation Layer
 *
 * Auto-escaping HTML tagged templates.
 */

export { SafeHtml, html, escape, raw, when, each, linebreaks } from './html.ts';
