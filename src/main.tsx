import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { App } from './components/App';
import { createEntryClient } from './lib/entryClient';
import { resolveArchiveBaseUrl } from './lib/config';
import spinnerPath from './spinner.svg';
import './main.css';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Missing #root element');
}

const client = createEntryClient({
  baseUrl: resolveArchiveBaseUrl(import.meta.env.VITE_ARCHIVE_BASE_URL),
});
const seed = Math.round(Math.random() * 2147483647);

createRoot(rootElement).render(
  <StrictMode>
    <App client={client} seed={seed} spinnerPath={spinnerPath} />
  </StrictMode>
);
