import type { EntryResult, Entry, FetchError, LoadState } from '../types';

export const NOT_REQUESTED: LoadState<never> = { status: 'not-requested' };
export const LOADING: LoadState<never> = { status: 'loading' };

export function fromResult(result: EntryResult): LoadState<Entry> {
  return result.ok
    ? { status: 'loaded', value: result.value }
    : { status: 'failed', error: result.error };
}

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'network':
      return `Could not reach the archive (${error.message})`;
    case 'http':
      return error.status === 404
        ? 'That entry does not exist.'
        : `The archive responded with status ${error.status}.`;
    case 'decode':
      return error.field === null
        ? 'The archive sent a response that is not valid JSON.'
        : `The archive sent an entry without "${error.field}".`;
  }
}
