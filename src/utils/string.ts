/**
 * String normalization utilities for rule ids, extensions and folder names.
 */

/**
 * Normalize free text into a rule identifier: lowercase, runs of anything
 * outside [a-z0-9] collapsed to '_', no leading or trailing '_'.
 *
 * @example normalizeIdentifier('Documents/PDF') // 'documents_pdf'
 */
export function normalizeIdentifier(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Normalize an extension to lowercase with a leading dot.
 * Throws on blank input.
 */
export function normalizeExtension(rawExtension: string): string {
  const ext = rawExtension.trim().toLowerCase();
  if (!ext) {
    throw new Error('extension cannot be empty');
  }
  return ext.startsWith('.') ? ext : `.${ext}`;
}

/**
 * Trim whitespace and surrounding slashes from a relative folder path.
 * Throws when nothing is left.
 */
export function normalizeSubfolder(fragment: string): string {
  const cleaned = fragment.trim().replace(/^\/+|\/+$/g, '');
  if (!cleaned) {
    throw new Error('subfolder cannot be empty');
  }
  return cleaned;
}

/**
 * Remove duplicates while keeping first occurrences in order.
 */
export function dedupe(items: Iterable<string>): string[] {
  return [...new Set(items)];
}

/**
 * Return the longest extension in `extensions` that `filename` ends with,
 * compared case-insensitively. Extensions must already be normalized.
 */
export function longestMatchingExtension(
  filename: string,
  extensions: Iterable<string>
): string | null {
  const lowerName = filename.toLowerCase();
  let best: string | null = null;
  for (const ext of extensions) {
    if (lowerName.endsWith(ext) && (best === null || ext.length > best.length)) {
      best = ext;
    }
  }
  return best;
}

/**
 * Split a file name into base and compound suffix, e.g.
 * `archive.tar.gz` → [`archive`, `.tar.gz`]. Leading dots belong to the base,
 * and a trailing dot means there is no suffix.
 */
export function splitCompoundSuffix(filename: string): [string, string] {
  if (filename.endsWith('.')) {
    return [filename, ''];
  }
  const leadingDots = filename.length - filename.replace(/^\.+/, '').length;
  const firstDot = filename.indexOf('.', leadingDots);
  if (firstDot <= 0) {
    return [filename, ''];
  }
  return [filename.slice(0, firstDot), filename.slice(firstDot)];
}

