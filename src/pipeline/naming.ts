// File and folder name helpers shared by the archive and conversion steps

const INVALID_NAME_CHARS = new Set(['<', '>', ':', '"', '/', '\\', '|', '?', '*']);

/**
 * Replace characters that are not allowed in file names on common file systems
 * and trim surrounding whitespace/dots. Returns `fallback` for empty results.
 */
export function safeName(value: string, fallback = 'invoice'): string {
  const cleaned = Array.from(value)
    .map((ch) => (INVALID_NAME_CHARS.has(ch) || ch.charCodeAt(0) < 32 ? '_' : ch))
    .join('')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .trim();
  return cleaned || fallback;
}

export function fileStem(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? name;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

export function hasExtension(name: string, extension: string): boolean {
  return name.toLowerCase().endsWith(extension.toLowerCase());
}
