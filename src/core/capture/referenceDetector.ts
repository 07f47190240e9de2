import type { CaptureKind } from '../notes/types.js';
import type { CaptureMode } from '../../config/index.js';

export interface DetectedReference {
  url: string;
  kind: CaptureKind;
}

export interface DetectorOptions {
  mediaHosts: readonly string[];
  mode: CaptureMode;
}

const URL_PATTERN = /(\+?)(https?:\/\/[^\s<>"'`]+)/gi;
const TRAILING_PUNCTUATION = /[.,;:!?'"]+$/;
const MEDIA_HOST_LABELS = new Set(['video', 'videos', 'media', 'audio', 'music']);
const MEDIA_EXTENSIONS = ['.mp4', '.m4a', '.mp3', '.webm', '.mkv', '.mov', '.ogg', '.wav', '.flac'];
const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/** Strips sentence punctuation and closing brackets that have no opener inside the URL. */
function trimUrl(candidate: string): string {
  let url = candidate;
  for (;;) {
    const stripped = url.replace(TRAILING_PUNCTUATION, '');
    const last = stripped.at(-1);
    const opener = last === undefined ? undefined : CLOSERS[last];
    if (opener !== undefined && countOf(stripped, opener) < countOf(stripped, last ?? '')) {
      url = stripped.slice(0, -1);
      continue;
    }
    return stripped;
  }
}

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

function parseCapturableUrl(candidate: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }
  const host = parsed.hostname;
  if (host !== 'localhost' && (!host.includes('.') || host.startsWith('.') || host.endsWith('.'))) {
    return null;
  }
  return parsed;
}

export function classifyUrl(url: URL, mediaHosts: readonly string[]): CaptureKind {
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  if (mediaHosts.some((media) => host === media || host.endsWith(`.${media}`))) {
    return 'media-file';
  }
  const firstLabel = host.split('.')[0] ?? '';
  if (MEDIA_HOST_LABELS.has(firstLabel)) {
    return 'media-file';
  }
  const path = url.pathname.toLowerCase();
  if (MEDIA_EXTENSIONS.some((extension) => path.endsWith(extension))) {
    return 'media-file';
  }
  return 'page-snapshot';
}

/**
 * Finds capturable URLs in a note body, deduplicated in order of first appearance.
 * In `marked` mode only URLs written as `+https://…` are returned.
 */
export function detectReferences(body: string, options: DetectorOptions): DetectedReference[] {
  const references: DetectedReference[] = [];
  const seen = new Set<string>();

  for (const match of body.matchAll(URL_PATTERN)) {
    const [, marker, raw] = match;
    if (raw === undefined) {
      continue;
    }
    if (options.mode === 'marked' && marker !== '+') {
      continue;
    }
    const trimmed = trimUrl(raw);
    const parsed = parseCapturableUrl(trimmed);
    if (!parsed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    references.push({ url: trimmed, kind: classifyUrl(parsed, options.mediaHosts) });
  }

  return references;
}
