import type { Attachment, Note } from '../notes/types.js';
import { compareNewestFirst, noteKey } from '../notes/types.js';
import { createLogger } from '../../utils/logger.js';
import { IndexCorruptionError } from '../../utils/errors.js';
import { tokenize } from './tokenizer.js';

export interface NoteSource {
  readAll(): Promise<Note[]>;
}

interface IndexState {
  postings: Map<string, Set<string>>;
  notes: Map<string, Note>;
  tokens: Map<string, string[]>;
}

function emptyState(): IndexState {
  return { postings: new Map(), notes: new Map(), tokens: new Map() };
}

function addToState(state: IndexState, note: Note): void {
  const key = noteKey(note.id);
  removeFromState(state, key);
  const tokens = tokenize(note.body);
  state.notes.set(key, note);
  state.tokens.set(key, tokens);
  for (const token of tokens) {
    let posting = state.postings.get(token);
    if (!posting) {
      posting = new Set();
      state.postings.set(token, posting);
    }
    posting.add(key);
  }
}

function removeFromState(state: IndexState, key: string): void {
  const previous = state.tokens.get(key);
  if (!previous) {
    return;
  }
  for (const token of previous) {
    const posting = state.postings.get(token);
    posting?.delete(key);
    if (posting && posting.size === 0) {
      state.postings.delete(token);
    }
  }
  state.notes.delete(key);
  state.tokens.delete(key);
}

/**
 * Inverted token index over note bodies. Derived from the note store and
 * replaceable at any time by `rebuild`.
 */
export class SearchIndex {
  private readonly logger = createLogger({ component: 'SearchIndex' });
  private state: IndexState = emptyState();
  private rebuilding: Promise<void> | null = null;
  private pendingDuringRebuild: Note[] | null = null;

  constructor(private readonly source: NoteSource) {}

  get size(): number {
    return this.state.notes.size;
  }

  indexNote(note: Note): void {
    addToState(this.state, note);
    this.pendingDuringRebuild?.push(note);
  }

  /** Replaces the attachment inside the indexed note snapshot; tokens are unaffected. */
  applyAttachment(attachment: Attachment): void {
    const key = noteKey(attachment.noteId);
    const note = this.state.notes.get(key);
    if (!note) {
      return;
    }
    const others = note.attachments.filter((existing) => existing.id !== attachment.id);
    const updated: Note = {
      ...note,
      attachments: [...others, attachment].sort((a, b) => a.ordinal - b.ordinal),
    };
    this.state.notes.set(key, updated);
    this.pendingDuringRebuild?.push(updated);
  }

  async query(terms: string | string[]): Promise<Note[]> {
    const tokens = normalizeQuery(terms);
    if (tokens.length === 0) {
      return [];
    }

    const first = this.lookup(tokens);
    if (first.ok) {
      return first.notes;
    }

    const corruption = new IndexCorruptionError(`Posting references unknown note ${first.missing}`);
    this.logger.error({ error: corruption, tokens }, 'Index inconsistent; rebuilding before answering');
    await this.rebuild();

    const second = this.lookup(tokens);
    if (second.ok) {
      return second.notes;
    }
    throw new IndexCorruptionError(`Index still inconsistent after rebuild (note ${second.missing})`);
  }

  /**
   * Builds a fresh index and swaps it in. Queries keep using the old index until the swap;
   * notes indexed meanwhile are replayed into the new one.
   */
  rebuild(notes?: readonly Note[]): Promise<void> {
    if (this.rebuilding) {
      return this.rebuilding;
    }
    const run = this.runRebuild(notes).finally(() => {
      this.rebuilding = null;
      this.pendingDuringRebuild = null;
    });
    this.rebuilding = run;
    return run;
  }

  /** Description of the first inconsistency found, or null when the index is sound. */
  verify(): string | null {
    for (const [token, keys] of this.state.postings) {
      for (const key of keys) {
        if (!this.state.notes.has(key)) {
          return `token "${token}" references unknown note ${key}`;
        }
      }
    }
    for (const [key, tokens] of this.state.tokens) {
      for (const token of tokens) {
        if (!this.state.postings.get(token)?.has(key)) {
          return `note ${key} missing from posting "${token}"`;
        }
      }
    }
    return null;
  }

  private async runRebuild(notes?: readonly Note[]): Promise<void> {
    const logger = this.logger.child({ method: 'rebuild' });
    this.pendingDuringRebuild = [];
    const startedAt = Date.now();

    const source = notes ?? (await this.source.readAll());
    const next = emptyState();
    for (const note of source) {
      addToState(next, note);
    }
    for (const note of this.pendingDuringRebuild) {
      addToState(next, note);
    }

    this.state = next;
    logger.info({ notes: next.notes.size, tokens: next.postings.size, ms: Date.now() - startedAt }, 'Index rebuilt');
  }

  private lookup(tokens: string[]): { ok: true; notes: Note[] } | { ok: false; missing: string } {
    const state = this.state;
    const postings = tokens.map((token) => state.postings.get(token));
    if (postings.some((posting) => posting === undefined || posting.size === 0)) {
      return { ok: true, notes: [] };
    }
    const sets = postings.filter((posting): posting is Set<string> => posting !== undefined);
    sets.sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = sets;
    if (!smallest) {
      return { ok: true, notes: [] };
    }

    const notes: Note[] = [];
    for (const key of smallest) {
      if (!rest.every((posting) => posting.has(key))) {
        continue;
      }
      const note = state.notes.get(key);
      if (!note) {
        return { ok: false, missing: key };
      }
      notes.push(note);
    }
    return { ok: true, notes: notes.sort(compareNewestFirst) };
  }
}

export function normalizeQuery(terms: string | string[]): string[] {
  const list = Array.isArray(terms) ? terms : [terms];
  return [...new Set(list.flatMap((term) => tokenize(term)))];
}
