import { createRef } from 'react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { act, cleanup, fireEvent, render, screen } from '@testing-library/react';
import { EntryViewBoundary } from './EntryViewBoundary';

describe('EntryViewBoundary', () => {
  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it('renders fallback and allows retry or a reset to latest', () => {
    const onReset = vi.fn();
    const boundary = createRef<EntryViewBoundary>();

    render(
      <EntryViewBoundary
        onReset={onReset}
        ref={boundary}
      >
        <p>Healthy child</p>
      </EntryViewBoundary>
    );

    expect(screen.getByText('Healthy child')).toBeTruthy();

    act(() => {
      boundary.current?.setState({ hasError: true });
    });

    expect(screen.getByText(/Something went wrong while showing this entry/i)).toBeTruthy();
    fireEvent.click(screen.getByRole('button', { name: 'Retry' }));
    expect(screen.getByText('Healthy child')).toBeTruthy();

    act(() => {
      boundary.current?.setState({ hasError: true });
    });
    fireEvent.click(screen.getByRole('button', { name: 'Latest' }));
    expect(onReset).toHaveBeenCalledTimes(1);
    expect(screen.getByText('Healthy child')).toBeTruthy();
  });

  it('logs render failures', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    function Broken(): never {
      throw new Error('bad entry');
    }

    render(
      <EntryViewBoundary onReset={vi.fn()}>
        <Broken />
      </EntryViewBoundary>
    );

    expect(screen.getByRole('alert')).toBeTruthy();
    expect(error).toHaveBeenCalledWith('[archive] Entry render failed', expect.any(Error), expect.anything());
  });
});
