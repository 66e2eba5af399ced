// One archive item, as decoded from the JSON API
export interface Entry {
  number: number;
  title: string;
  safeTitle: string;
  alternateText: string;
  day: string;
  month: string;
  year: string;
  imageLink: string;
  externalLink: string;
  newsNote: string;
  transcript: string;
}

export type FetchError =
  | { kind: 'network'; message: string }
  | { kind: 'http'; status: number }
  // field is null when the body was not JSON at all
  | { kind: 'decode'; field: string | null };

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type EntryResult = Result<Entry, FetchError>;

export type LoadState<T> =
  | { status: 'not-requested' }
  | { status: 'loading' }
  | { status: 'loaded'; value: T }
  | { status: 'failed'; error: FetchError };

export type NavigationIntent =
  | { type: 'show-latest' }
  | { type: 'show-random' }
  | { type: 'show-entry'; number: number }
  | { type: 'show-not-found' };

export type Shortcut = 'previous' | 'next' | 'latest' | 'random';
