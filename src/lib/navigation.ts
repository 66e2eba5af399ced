import type { Entry, EntryResult, LoadState, NavigationIntent, Shortcut } from '../types';
import { LOADING, NOT_REQUESTED, fromResult } from './loadState';
import { drawEntryNumber, normalizeSeed } from './randomEntry';

export interface NavigationModel {
  randomSeed: number;
  currentRoute: NavigationIntent;
  latest: LoadState<Entry>;
  requested: LoadState<Entry>;
  // Id of the numbered fetch whose result `requested` is waiting for.
  requestId: number;
}

export type NavigationEvent =
  | { type: 'route-changed'; intent: NavigationIntent }
  | { type: 'latest-loaded'; result: EntryResult }
  | { type: 'requested-loaded'; requestId: number; result: EntryResult }
  | { type: 'keyboard-shortcut'; shortcut: Shortcut };

export type NavigationCommand =
  | { type: 'fetch-latest' }
  | { type: 'fetch-entry'; number: number; requestId: number }
  | { type: 'navigate'; intent: NavigationIntent; replace: boolean };

export interface NavigationTransition {
  model: NavigationModel;
  commands: NavigationCommand[];
}

export function createNavigationModel(seed: number): NavigationModel {
  return {
    randomSeed: normalizeSeed(seed),
    currentRoute: { type: 'show-latest' },
    latest: NOT_REQUESTED,
    requested: NOT_REQUESTED,
    requestId: 0,
  };
}

function settle(model: NavigationModel, commands: NavigationCommand[] = []): NavigationTransition {
  return { model, commands };
}

// Random picks become a real navigation so they can be bookmarked and the
// back button skips the `random` fragment.
function resolveRandom(model: NavigationModel): NavigationTransition {
  switch (model.latest.status) {
    case 'loaded': {
      const draw = drawEntryNumber(model.randomSeed, model.latest.value.number);
      return settle(
        { ...model, randomSeed: draw.nextSeed },
        [{ type: 'navigate', intent: { type: 'show-entry', number: draw.value }, replace: true }]
      );
    }
    case 'failed':
      return settle(model, [{ type: 'navigate', intent: { type: 'show-latest' }, replace: true }]);
    case 'loading':
      return settle(model);
    case 'not-requested':
      return settle({ ...model, latest: LOADING }, [{ type: 'fetch-latest' }]);
  }
}

function handleRouteChanged(model: NavigationModel, intent: NavigationIntent): NavigationTransition {
  const routed: NavigationModel = { ...model, currentRoute: intent };

  switch (intent.type) {
    case 'show-latest': {
      if (model.latest.status === 'loaded') {
        return settle({ ...routed, requested: model.latest });
      }
      if (model.latest.status === 'loading') {
        return settle({ ...routed, requested: LOADING });
      }
      return settle({ ...routed, latest: LOADING, requested: LOADING }, [{ type: 'fetch-latest' }]);
    }
    case 'show-entry': {
      const requestId = model.requestId + 1;
      const commands: NavigationCommand[] = [{ type: 'fetch-entry', number: intent.number, requestId }];
      const needsLatest = model.latest.status === 'not-requested' || model.latest.status === 'failed';
      if (needsLatest) {
        commands.unshift({ type: 'fetch-latest' });
      }
      return settle(
        {
          ...routed,
          requested: LOADING,
          requestId,
          latest: needsLatest ? LOADING : model.latest,
        },
        commands
      );
    }
    case 'show-random':
      return resolveRandom({ ...routed, requested: LOADING });
    case 'show-not-found':
      return settle({ ...routed, requested: NOT_REQUESTED });
  }
}

function handleLatestLoaded(model: NavigationModel, result: EntryResult): NavigationTransition {
  // A failed refetch keeps the archive bound we already know.
  const latest = !result.ok && model.latest.status === 'loaded' ? model.latest : fromResult(result);
  const next: NavigationModel = { ...model, latest };

  switch (model.currentRoute.type) {
    case 'show-latest':
      return settle({ ...next, requested: latest });
    case 'show-random':
      return resolveRandom(next);
    case 'show-entry':
    case 'show-not-found':
      return settle(next);
  }
}

function handleRequestedLoaded(
  model: NavigationModel,
  requestId: number,
  result: EntryResult
): NavigationTransition {
  if (requestId !== model.requestId || model.currentRoute.type !== 'show-entry') {
    return settle(model);
  }
  return settle({ ...model, requested: fromResult(result) });
}

export function planShortcutIntent(model: NavigationModel, shortcut: Shortcut): NavigationIntent | null {
  if (model.requested.status !== 'loaded') {
    return null;
  }
  const current = model.requested.value.number;

  switch (shortcut) {
    case 'previous':
      return current > 1 ? { type: 'show-entry', number: current - 1 } : null;
    case 'next':
      if (model.latest.status !== 'loaded' || current >= model.latest.value.number) {
        return null;
      }
      return { type: 'show-entry', number: current + 1 };
    case 'latest':
      return { type: 'show-latest' };
    case 'random':
      return { type: 'show-random' };
  }
}

export function handleNavigationEvent(model: NavigationModel, event: NavigationEvent): NavigationTransition {
  switch (event.type) {
    case 'route-changed':
      return handleRouteChanged(model, event.intent);
    case 'latest-loaded':
      return handleLatestLoaded(model, event.result);
    case 'requested-loaded':
      return handleRequestedLoaded(model, event.requestId, event.result);
    case 'keyboard-shortcut': {
      const intent = planShortcutIntent(model, event.shortcut);
      return intent
        ? settle(model, [{ type: 'navigate', intent, replace: false }])
        : settle(model);
    }
  }
}
