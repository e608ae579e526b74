/**
 * Utility functions for sanitizing HTML and filesystem names
 */

/**
 * Escape HTML special characters to prevent XSS
 * @param str - String to escape
 * @returns HTML-safe string
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Convert an arbitrary test name into a filesystem-safe slug.
 * Anything outside `[A-Za-z0-9_-]` becomes `_`, and runs of `_` collapse to one.
 */
export function deriveSlug(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').replace(/_+/g, '_');
}

/**
 * Turn a slug back into something readable. Lossy: the original
 * punctuation and spacing are gone.
 */
export function slugToDisplayName(slug: string): string {
  return slug.replace(/_/g, ' ');
}
