import type { Entry, NavigationIntent } from '../types';
import { describeFetchError } from './loadState';
import type { NavigationModel } from './navigation';

export const APP_TITLE = 'Comic Archive';

export interface EntryNavigation {
  previous: NavigationIntent | null;
  next: NavigationIntent | null;
  latest: NavigationIntent;
  random: NavigationIntent;
}

export type EntryView =
  | { screen: 'loading' }
  | { screen: 'not-found' }
  | { screen: 'error'; message: string }
  | { screen: 'entry'; entry: Entry; navigation: EntryNavigation };

const LATEST_INTENT: NavigationIntent = { type: 'show-latest' };
const RANDOM_INTENT: NavigationIntent = { type: 'show-random' };

export function planEntryNavigation(entry: Entry, latest: Entry): EntryNavigation {
  return {
    previous: entry.number > 1 ? { type: 'show-entry', number: entry.number - 1 } : null,
    next: entry.number < latest.number ? { type: 'show-entry', number: entry.number + 1 } : null,
    latest: LATEST_INTENT,
    random: RANDOM_INTENT,
  };
}

function selectPairedView(model: NavigationModel, entry: Entry): EntryView {
  switch (model.latest.status) {
    case 'loaded':
      return { screen: 'entry', entry, navigation: planEntryNavigation(entry, model.latest.value) };
    case 'failed':
      return { screen: 'error', message: describeFetchError(model.latest.error) };
    case 'loading':
    case 'not-requested':
      return { screen: 'loading' };
  }
}

export function selectEntryView(model: NavigationModel): EntryView {
  switch (model.currentRoute.type) {
    case 'show-not-found':
      return { screen: 'not-found' };
    case 'show-random':
      return { screen: 'loading' };
    case 'show-latest':
    case 'show-entry':
      break;
  }

  switch (model.requested.status) {
    case 'not-requested':
    case 'loading':
      return { screen: 'loading' };
    case 'failed':
      return { screen: 'error', message: describeFetchError(model.requested.error) };
    case 'loaded':
      return selectPairedView(model, model.requested.value);
  }
}

export function getDocumentTitle(view: EntryView): string {
  switch (view.screen) {
    case 'entry': {
      const title = view.entry.safeTitle || view.entry.title;
      return `#${view.entry.number}: ${title} | ${APP_TITLE}`;
    }
    case 'not-found':
      return `Not found | ${APP_TITLE}`;
    default:
      return APP_TITLE;
  }
}

export function formatPublicationDate(entry: Entry): string {
  if (!entry.year || !entry.month || !entry.day) {
    return '';
  }
  return `${entry.year}-${entry.month.padStart(2, '0')}-${entry.day.padStart(2, '0')}`;
}
