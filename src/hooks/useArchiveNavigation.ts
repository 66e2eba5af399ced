import { useCallback, useEffect, useRef, useState } from 'react';
import type { NavigationIntent, Shortcut } from '../types';
import type { EntryClient } from '../lib/entryClient';
import {
  createNavigationModel,
  handleNavigationEvent,
  type NavigationCommand,
  type NavigationEvent,
  type NavigationModel,
} from '../lib/navigation';
import { formatRoute, parseRoute } from '../lib/routeCodec';

interface UseArchiveNavigationOptions {
  client: EntryClient;
  seed: number;
}

export interface ArchiveNavigation {
  model: NavigationModel;
  navigate: (intent: NavigationIntent) => void;
  onShortcut: (shortcut: Shortcut) => void;
}

function readCurrentRoute(): NavigationIntent {
  return parseRoute(window.location.hash);
}

/**
 * Runs the navigation state machine against the location hash and the entry
 * client. Every event is applied to the latest model before its commands run.
 */
export function useArchiveNavigation({ client, seed }: UseArchiveNavigationOptions): ArchiveNavigation {
  const modelRef = useRef<NavigationModel | null>(null);
  if (modelRef.current === null) {
    modelRef.current = createNavigationModel(seed);
  }
  const [model, setModel] = useState<NavigationModel>(modelRef.current);
  const mountedRef = useRef(false);
  const dispatchRef = useRef<(event: NavigationEvent) => void>(() => {});

  const runCommand = useCallback((command: NavigationCommand) => {
    switch (command.type) {
      case 'fetch-latest':
        void client.fetchLatest().then((result) => {
          if (!result.ok) console.warn('[archive] Latest entry failed to load', result.error);
          dispatchRef.current({ type: 'latest-loaded', result });
        });
        return;
      case 'fetch-entry':
        void client.fetchByNumber(command.number).then((result) => {
          if (!result.ok) console.warn(`[archive] Entry ${command.number} failed to load`, result.error);
          dispatchRef.current({ type: 'requested-loaded', requestId: command.requestId, result });
        });
        return;
      case 'navigate': {
        const fragment = formatRoute(command.intent);
        if (command.replace) {
          window.history.replaceState(null, '', fragment);
          dispatchRef.current({ type: 'route-changed', intent: readCurrentRoute() });
        } else if (window.location.hash !== fragment) {
          // hashchange feeds the new route back in
          window.location.hash = fragment;
        } else {
          // Same fragment fires no hashchange; re-enter the route to retry it.
          dispatchRef.current({ type: 'route-changed', intent: readCurrentRoute() });
        }
        return;
      }
    }
  }, [client]);

  const dispatch = useCallback((event: NavigationEvent) => {
    if (!mountedRef.current || modelRef.current === null) return;
    const transition = handleNavigationEvent(modelRef.current, event);
    modelRef.current = transition.model;
    setModel(transition.model);
    transition.commands.forEach(runCommand);
  }, [runCommand]);

  useEffect(() => {
    mountedRef.current = true;
    dispatchRef.current = dispatch;

    const handleHashChange = () => {
      dispatch({ type: 'route-changed', intent: readCurrentRoute() });
    };

    window.addEventListener('hashchange', handleHashChange);
    handleHashChange();

    return () => {
      mountedRef.current = false;
      window.removeEventListener('hashchange', handleHashChange);
    };
  }, [dispatch]);

  const navigate = useCallback((intent: NavigationIntent) => {
    runCommand({ type: 'navigate', intent, replace: false });
  }, [runCommand]);

  const onShortcut = useCallback((shortcut: Shortcut) => {
    dispatch({ type: 'keyboard-shortcut', shortcut });
  }, [dispatch]);

  return { model, navigate, onShortcut };
}
