/**
 * Normalize a free-text block label into a filesystem-safe slug.
 *
 * Accents are folded to ASCII, everything is lowercased, every run of
 * non-alphanumeric characters becomes a single underscore, and underscores
 * at either end are removed.
 *
 * @example
 * normalizeLabel('My Cool Component!!'); // 'my_cool_component'
 * normalizeLabel('---');                 // ''
 */
export function normalizeLabel(label: string): string {
  return label
    .trim()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Hyphenated slug used for project directory names derived from an idea.
 */
export function projectSlug(text: string, maxLength = 40): string {
  return normalizeLabel(text)
    .slice(0, maxLength)
    .replace(/_+$/, '')
    .replace(/_/g, '-');
}
