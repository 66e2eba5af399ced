import { useEffect, useCallback } from 'react';
import type { Shortcut } from '../types';
import { resolveShortcut } from '../lib/appKeyboard';

interface KeyboardHandlers {
  onShortcut?: (shortcut: Shortcut) => void;
}

function isEditableTarget(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  return target.tagName === 'INPUT' || target.tagName === 'TEXTAREA' || target.isContentEditable;
}

export function useKeyboard(handlers: KeyboardHandlers): void {
  const handleKeyDown = useCallback((event: KeyboardEvent) => {
    // Ignore if user is typing in an input
    if (isEditableTarget(event.target)) {
      return;
    }
    if (event.altKey || event.ctrlKey || event.metaKey || event.shiftKey) {
      return;
    }

    const shortcut = resolveShortcut(event.code);
    if (!shortcut) return;

    event.preventDefault();
    handlers.onShortcut?.(shortcut);
  }, [handlers]);

  useEffect(() => {
    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [handleKeyDown]);
}
