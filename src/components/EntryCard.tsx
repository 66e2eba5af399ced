import type { Entry } from '../types';
import { formatPublicationDate } from '../lib/entryViewState';

interface EntryCardProps {
  entry: Entry;
}

export function EntryCard({ entry }: EntryCardProps) {
  const title = entry.safeTitle || entry.title;
  const published = formatPublicationDate(entry);

  return (
    <article className="entry-card">
      <header className="entry-header">
        <h2 className="entry-title">{title}</h2>
        <p className="entry-meta">
          #{entry.number}
          {published && <> · <time dateTime={published}>{published}</time></>}
        </p>
      </header>
      <figure className="entry-figure">
        <img
          className="entry-image"
          src={entry.imageLink}
          alt={title}
          title={entry.alternateText || undefined}
        />
        {entry.alternateText && <figcaption className="entry-caption">{entry.alternateText}</figcaption>}
      </figure>
      {entry.externalLink && (
        <p className="entry-link">
          <a href={entry.externalLink} target="_blank" rel="noreferrer">{entry.externalLink}</a>
        </p>
      )}
      {entry.newsNote && <p className="entry-news">{entry.newsNote}</p>}
      {entry.transcript && (
        <details className="entry-transcript">
          <summary>Transcript</summary>
          <pre>{entry.transcript}</pre>
        </details>
      )}
    </article>
  );
}
