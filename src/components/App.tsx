import { useEffect, useMemo } from 'react';
import type { NavigationIntent } from '../types';
import type { EntryClient } from '../lib/entryClient';
import { APP_TITLE, getDocumentTitle, selectEntryView, type EntryView } from '../lib/entryViewState';
import { formatRoute } from '../lib/routeCodec';
import { useArchiveNavigation } from '../hooks/useArchiveNavigation';
import { useKeyboard } from '../hooks/useKeyboard';
import { EntryCard } from './EntryCard';
import { EntryViewBoundary } from './EntryViewBoundary';
import { NavigationBar } from './NavigationBar';

interface AppProps {
  client: EntryClient;
  seed: number;
  spinnerPath: string;
}

const LATEST_INTENT: NavigationIntent = { type: 'show-latest' };

function renderView(
  view: EntryView,
  spinnerPath: string,
  onNavigate: (intent: NavigationIntent) => void
) {
  switch (view.screen) {
    case 'loading':
      return (
        <div className="entry-loading" role="status">
          <img src={spinnerPath} alt="Loading" className="entry-spinner" />
        </div>
      );
    case 'not-found':
      return (
        <div className="entry-not-found">
          <p>There is no entry at this address.</p>
          <a
            href={formatRoute(LATEST_INTENT)}
            onClick={(event) => {
              event.preventDefault();
              onNavigate(LATEST_INTENT);
            }}
          >
            Go to the latest entry
          </a>
        </div>
      );
    case 'error':
      return (
        <>
          <NavigationBar onNavigate={onNavigate} />
          <p className="entry-error" role="alert">{view.message}</p>
        </>
      );
    case 'entry':
      return (
        <>
          <NavigationBar
            previous={view.navigation.previous}
            next={view.navigation.next}
            onNavigate={onNavigate}
          />
          <EntryCard entry={view.entry} />
        </>
      );
  }
}

export function App({ client, seed, spinnerPath }: AppProps) {
  const { model, navigate, onShortcut } = useArchiveNavigation({ client, seed });
  const view = useMemo(() => selectEntryView(model), [model]);
  const keyboardHandlers = useMemo(() => ({ onShortcut }), [onShortcut]);

  useKeyboard(keyboardHandlers);

  useEffect(() => {
    document.title = getDocumentTitle(view);
  }, [view]);

  return (
    <div className="app">
      <header className="app-header">
        <h1>{APP_TITLE}</h1>
      </header>
      <main className="app-main">
        <EntryViewBoundary onReset={() => navigate(LATEST_INTENT)}>
          {renderView(view, spinnerPath, navigate)}
        </EntryViewBoundary>
      </main>
    </div>
  );
}
