import type { Shortcut } from '../types';

const SHORTCUT_CODES = new Map<string, Shortcut>([
  ['ArrowLeft', 'previous'],
  ['KeyP', 'previous'],
  ['KeyK', 'previous'],
  ['ArrowRight', 'next'],
  ['KeyN', 'next'],
  ['KeyJ', 'next'],
  ['KeyL', 'latest'],
  ['Home', 'latest'],
  ['KeyR', 'random'],
]);

export function resolveShortcut(code: string): Shortcut | null {
  return SHORTCUT_CODES.get(code) ?? null;
}

export const SHORTCUT_HINTS: Record<Shortcut, string> = {
  previous: '← or P',
  next: '→ or N',
  latest: 'L',
  random: 'R',
};
