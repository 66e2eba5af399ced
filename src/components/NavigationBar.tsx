import type { NavigationIntent, Shortcut } from '../types';
import { formatRoute } from '../lib/routeCodec';
import { SHORTCUT_HINTS } from '../lib/appKeyboard';

interface NavigationLink {
  shortcut: Shortcut;
  label: string;
  intent: NavigationIntent | null;
}

interface NavigationBarProps {
  previous?: NavigationIntent | null;
  next?: NavigationIntent | null;
  onNavigate: (intent: NavigationIntent) => void;
}

export function NavigationBar({ previous = null, next = null, onNavigate }: NavigationBarProps) {
  const links: NavigationLink[] = [
    { shortcut: 'previous', label: '< Prev', intent: previous },
    { shortcut: 'random', label: 'Random', intent: { type: 'show-random' } },
    { shortcut: 'next', label: 'Next >', intent: next },
    { shortcut: 'latest', label: 'Latest', intent: { type: 'show-latest' } },
  ];

  return (
    <nav className="entry-nav" aria-label="Entry navigation">
      {links.map(({ shortcut, label, intent }) => intent && (
        <a
          key={shortcut}
          className="entry-nav-link"
          href={formatRoute(intent)}
          title={`${label} (${SHORTCUT_HINTS[shortcut]})`}
          onClick={(event) => {
            event.preventDefault();
            onNavigate(intent);
          }}
        >
          {label}
        </a>
      ))}
    </nav>
  );
}
