import type { Entry, FetchError, Result } from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === 'string' ? value : '';
}

function requiredString(payload: Record<string, unknown>, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Decode an archive `info.0.json` payload. `num`, `title` and `img` are
 * required, and an empty `title` or `img` counts as missing; every other
 * field falls back to an empty string.
 */
export function decodeEntry(payload: unknown): Result<Entry, FetchError> {
  if (!isRecord(payload)) {
    return { ok: false, error: { kind: 'decode', field: 'num' } };
  }

  const number = payload.num;
  if (typeof number !== 'number' || !Number.isSafeInteger(number) || number < 1) {
    return { ok: false, error: { kind: 'decode', field: 'num' } };
  }

  const title = requiredString(payload, 'title');
  if (title === null) {
    return { ok: false, error: { kind: 'decode', field: 'title' } };
  }

  const imageLink = requiredString(payload, 'img');
  if (imageLink === null) {
    return { ok: false, error: { kind: 'decode', field: 'img' } };
  }

  return {
    ok: true,
    value: {
      number,
      title,
      safeTitle: optionalString(payload, 'safe_title'),
      alternateText: optionalString(payload, 'alt'),
      day: optionalString(payload, 'day'),
      month: optionalString(payload, 'month'),
      year: optionalString(payload, 'year'),
      imageLink,
      externalLink: optionalString(payload, 'link'),
      newsNote: optionalString(payload, 'news'),
      transcript: optionalString(payload, 'transcript'),
    },
  };
}
