/**
 * Template rendering boundary.
 *
 * Templates use Jinja-style syntax: `{{ var }}`, `{% if %}`, `{# comment #}`.
 * Undefined variables are errors so a typo never renders as an empty string.
 */

import nunjucks from 'nunjucks';
import { RenderError } from './errors.js';

/**
 * Markers that identify a line carrying template syntax
 */
export const TEMPLATE_MARKERS = ['{{', '{%', '{#'] as const;

export function hasTemplateSyntax(line: string): boolean {
  return TEMPLATE_MARKERS.some((marker) => line.includes(marker));
}

const environment = new nunjucks.Environment(null, {
  autoescape: false,
  throwOnUndefined: true,
  trimBlocks: false,
  lstripBlocks: false,
});

/**
 * Render a template body with the given variables.
 * Throws RenderError naming the source file.
 */
export function renderTemplate(body: string, context: Record<string, unknown>, src: string): string {
  try {
    return environment.renderString(body, context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(`Failed to render ${src}: ${message.trim()}`, { src });
  }
}
