import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react';
import { App } from './App';
import type { EntryClient } from '../lib/entryClient';
import type { Entry, EntryResult } from '../types';

function makeEntry(number: number): Entry {
  return {
    number,
    title: `Entry ${number}`,
    safeTitle: `Entry ${number}`,
    alternateText: `Caption ${number}`,
    day: '1',
    month: '4',
    year: '2015',
    imageLink: `https://images.example.com/${number}.png`,
    externalLink: '',
    newsNote: '',
    transcript: '',
  };
}

function makeClient(latestNumber: number) {
  const fetchLatest = vi.fn(async (): Promise<EntryResult> => ({ ok: true, value: makeEntry(latestNumber) }));
  const fetchByNumber = vi.fn(async (number: number): Promise<EntryResult> => ({ ok: true, value: makeEntry(number) }));
  const client: EntryClient = { fetchLatest, fetchByNumber };
  return { client, fetchLatest, fetchByNumber };
}

describe('App integration smoke', () => {
  beforeEach(() => {
    window.history.replaceState(null, '', '#/');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it('shows the spinner and then the latest entry without a next link', async () => {
    const { client } = makeClient(300);
    render(<App client={client} seed={1} spinnerPath="/spinner.svg" />);

    expect(screen.getByRole('status')).toBeTruthy();

    expect(await screen.findByRole('heading', { name: 'Entry 300' })).toBeTruthy();
    expect(screen.queryByRole('link', { name: 'Next >' })).toBeNull();
    expect(screen.getByRole('link', { name: '< Prev' }).getAttribute('href')).toBe('#/entries/299');
    await waitFor(() => {
      expect(document.title).toBe('#300: Entry 300 | Comic Archive');
    });
  });

  it('deep links to an entry and steps back with the keyboard', async () => {
    window.history.replaceState(null, '', '#/entries/5');
    const { client, fetchByNumber } = makeClient(300);
    render(<App client={client} seed={1} spinnerPath="/spinner.svg" />);

    expect(await screen.findByRole('heading', { name: 'Entry 5' })).toBeTruthy();
    expect(screen.getByRole('link', { name: 'Next >' }).getAttribute('href')).toBe('#/entries/6');

    fireEvent.keyDown(window, { code: 'ArrowLeft' });

    expect(await screen.findByRole('heading', { name: 'Entry 4' })).toBeTruthy();
    expect(window.location.hash).toBe('#/entries/4');
    expect(fetchByNumber).toHaveBeenLastCalledWith(4);
  });

  it('navigates through the navigation links', async () => {
    window.history.replaceState(null, '', '#/entries/1');
    const { client } = makeClient(300);
    render(<App client={client} seed={1} spinnerPath="/spinner.svg" />);

    expect(await screen.findByRole('heading', { name: 'Entry 1' })).toBeTruthy();
    expect(screen.queryByRole('link', { name: '< Prev' })).toBeNull();

    fireEvent.click(screen.getByRole('link', { name: 'Latest' }));

    expect(await screen.findByRole('heading', { name: 'Entry 300' })).toBeTruthy();
    expect(window.location.hash).toBe('#/');
  });

  it('shows a not-found page for unknown routes', async () => {
    window.history.replaceState(null, '', '#/nowhere');
    const { client, fetchLatest, fetchByNumber } = makeClient(300);
    render(<App client={client} seed={1} spinnerPath="/spinner.svg" />);

    expect(screen.getByText('There is no entry at this address.')).toBeTruthy();
    expect(fetchLatest).not.toHaveBeenCalled();
    expect(fetchByNumber).not.toHaveBeenCalled();

    fireEvent.click(screen.getByRole('link', { name: 'Go to the latest entry' }));
    expect(await screen.findByRole('heading', { name: 'Entry 300' })).toBeTruthy();
  });

  it('retries a failed latest load from the latest link on the root route', async () => {
    const { client, fetchLatest } = makeClient(300);
    fetchLatest.mockResolvedValueOnce({ ok: false, error: { kind: 'network', message: 'offline' } });
    render(<App client={client} seed={1} spinnerPath="/spinner.svg" />);

    expect(await screen.findByText('Could not reach the archive (offline)')).toBeTruthy();
    expect(fetchLatest).toHaveBeenCalledTimes(1);

    fireEvent.click(screen.getByRole('link', { name: 'Latest' }));

    expect(await screen.findByRole('heading', { name: 'Entry 300' })).toBeTruthy();
    expect(fetchLatest).toHaveBeenCalledTimes(2);
    expect(window.location.hash).toBe('#/');
  });

  it('shows failures with latest and random still reachable', async () => {
    window.history.replaceState(null, '', '#/entries/9999');
    const { client, fetchByNumber } = makeClient(300);
    fetchByNumber.mockResolvedValueOnce({ ok: false, error: { kind: 'http', status: 404 } });
    render(<App client={client} seed={1} spinnerPath="/spinner.svg" />);

    expect(await screen.findByText('That entry does not exist.')).toBeTruthy();
    expect(screen.getByRole('link', { name: 'Latest' })).toBeTruthy();
    expect(screen.getByRole('link', { name: 'Random' })).toBeTruthy();
    expect(screen.queryByRole('link', { name: 'Next >' })).toBeNull();
  });
});
