import type { NavigationIntent } from '../types';

const ROOT_FRAGMENT = '#/';
const ENTRY_PATH_PATTERN = /^\/entries\/(random|[1-9][0-9]*)$/;

/**
 * Maps a location hash (`#/entries/42`) to the intent it names.
 */
export function parseRoute(fragment: string): NavigationIntent {
  const path = fragment.startsWith('#') ? fragment.slice(1) : fragment;
  if (path === '' || path === '/') {
    return { type: 'show-latest' };
  }

  const match = ENTRY_PATH_PATTERN.exec(path);
  if (!match) {
    return { type: 'show-not-found' };
  }

  const target = match[1];
  if (target === 'random') {
    return { type: 'show-random' };
  }

  const number = Number.parseInt(target, 10);
  if (!Number.isSafeInteger(number)) {
    return { type: 'show-not-found' };
  }
  return { type: 'show-entry', number };
}

// show-not-found has no canonical URL; it formats to the root.
export function formatRoute(intent: NavigationIntent): string {
  switch (intent.type) {
    case 'show-latest':
    case 'show-not-found':
      return ROOT_FRAGMENT;
    case 'show-random':
      return '#/entries/random';
    case 'show-entry':
      return `#/entries/${intent.number}`;
  }
}

