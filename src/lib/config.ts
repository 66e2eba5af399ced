export const DEFAULT_ARCHIVE_BASE_URL = 'https://xkcd.now.sh/https://xkcd.com';

/**
 * Resolve the archive proxy prefix. Invalid values fall back to the default
 * proxy with a warning.
 */
export function resolveArchiveBaseUrl(rawBaseUrl: string | undefined): string {
  const trimmed = rawBaseUrl?.trim();
  if (!trimmed) return DEFAULT_ARCHIVE_BASE_URL;

  if (!/^https?:\/\//i.test(trimmed) && !trimmed.startsWith('/')) {
    console.warn(
      `[archive] Invalid VITE_ARCHIVE_BASE_URL "${trimmed}". Falling back to ${DEFAULT_ARCHIVE_BASE_URL}.`,
    );
    return DEFAULT_ARCHIVE_BASE_URL;
  }

  return trimmed.replace(/\/+$/, '');
}
