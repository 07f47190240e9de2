import { createHash } from 'node:crypto';
import { join } from 'node:path';
import type { CaptureKind } from '../notes/types.js';

const MAX_NAME_LENGTH = 100;

const KIND_LAYOUT: Record<CaptureKind, { dir: string; extension: string }> = {
  'page-snapshot': { dir: 'webpages', extension: '.html' },
  'media-file': { dir: 'media', extension: '' },
};

/** Filesystem-safe name derived from a URL, with a short hash so distinct URLs never collide. */
export function urlToSafeFilename(url: string): string {
  const stripped = url.trim().replace(/^https?:\/\//i, '');
  const safe = Array.from(stripped, (char) => (/[\p{L}\p{N}._-]/u.test(char) ? char : '_'))
    .join('')
    .replace(/^[.\s]+|[.\s]+$/g, '')
    .slice(0, MAX_NAME_LENGTH);
  const hash = createHash('sha1').update(url).digest('hex').slice(0, 8);
  return `${safe || 'capture'}-${hash}`;
}

/** Artifact location relative to the attachments directory. */
export function relativeArtifactPath(url: string, kind: CaptureKind): string {
  const layout = KIND_LAYOUT[kind];
  return join(layout.dir, `${urlToSafeFilename(url)}${layout.extension}`);
}
