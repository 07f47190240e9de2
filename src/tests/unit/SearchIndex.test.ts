import { describe, it, expect, vi } from 'vitest';
import { SearchIndex } from '../../core/search/SearchIndex.js';
import type { NoteSource } from '../../core/search/SearchIndex.js';
import type { Attachment, Note } from '../../core/notes/types.js';
import { IndexCorruptionError } from '../../utils/errors.js';
import { makeNote } from '../fixtures.js';

function sourceOf(notes: Note[]) {
  return { readAll: vi.fn(async (): Promise<Note[]> => notes) };
}

const ids = (notes: Note[]): string[] => notes.map((note) => `${note.id.day}#${note.id.seq}`);

describe('SearchIndex', () => {
  const notes = [
    makeNote('2024-01-01', 1, 'Buy milk and bread'),
    makeNote('2024-01-01', 2, 'Milk prices are up #groceries'),
    makeNote('2024-01-02', 1, 'Bread recipe from grandma'),
    makeNote('2024-01-02', 2, 'Work on the #work plan'),
  ];

  function indexed(): SearchIndex {
    const index = new SearchIndex(sourceOf(notes));
    for (const note of notes) {
      index.indexNote(note);
    }
    return index;
  }

  it('should find notes containing a term regardless of case', async () => {
    expect(ids(await indexed().query('MILK'))).toEqual(['2024-01-01#2', '2024-01-01#1']);
  });

  it('should require every term to match', async () => {
    const index = indexed();
    expect(ids(await index.query('milk bread'))).toEqual(['2024-01-01#1']);
    expect(ids(await index.query(['bread', 'grandma']))).toEqual(['2024-01-02#1']);
    expect(await index.query('milk grandma')).toEqual([]);
  });

  it('should order results newest first across days', async () => {
    expect(ids(await indexed().query('bread'))).toEqual(['2024-01-02#1', '2024-01-01#1']);
  });

  it('should match tags only with the marker', async () => {
    const index = indexed();
    expect(ids(await index.query('#work'))).toEqual(['2024-01-02#2']);
    expect(ids(await index.query('#groceries'))).toEqual(['2024-01-01#2']);
    expect(await index.query('#bread')).toEqual([]);
  });

  it('should return nothing for an empty query', async () => {
    expect(await indexed().query('  ')).toEqual([]);
  });

  it('should index a note once however often it is added', async () => {
    const index = indexed();
    const first = notes[0];
    if (!first) throw new Error('fixture missing');
    index.indexNote(first);
    index.indexNote(first);
    expect(index.size).toBe(4);
    expect(ids(await index.query('buy'))).toEqual(['2024-01-01#1']);
  });

  it('should answer the same after a rebuild from the source', async () => {
    const index = indexed();
    const queries = ['milk', 'bread', '#work', 'plan', 'up'];
    const before = await Promise.all(queries.map((query) => index.query(query)));

    await index.rebuild();

    const after = await Promise.all(queries.map((query) => index.query(query)));
    expect(after).toEqual(before);
    expect(index.verify()).toBeNull();
  });

  it('should keep serving the old index during a rebuild and keep notes added meanwhile', async () => {
    let release: (value: Note[]) => void = () => undefined;
    const source: NoteSource = {
      readAll: () =>
        new Promise<Note[]>((resolve) => {
          release = resolve;
        }),
    };
    const index = new SearchIndex(source);
    const old = makeNote('2024-01-01', 1, 'old entry');
    index.indexNote(old);

    const rebuilding = index.rebuild();
    expect(ids(await index.query('old'))).toEqual(['2024-01-01#1']);
    index.indexNote(makeNote('2024-01-03', 1, 'fresh entry'));

    release([old]);
    await rebuilding;

    expect(ids(await index.query('entry'))).toEqual(['2024-01-03#1', '2024-01-01#1']);
  });

  it('should rebuild from the source when a posting points at a missing note', async () => {
    const source = sourceOf(notes);
    const index = new SearchIndex(source);
    for (const note of notes) {
      index.indexNote(note);
    }
    (index as unknown as { state: { notes: Map<string, Note> } }).state.notes.delete('2024-01-01#1');
    expect(index.verify()).toMatch(/unknown note 2024-01-01#1/);

    expect(ids(await index.query('buy'))).toEqual(['2024-01-01#1']);
    expect(source.readAll).toHaveBeenCalledTimes(1);
    expect(index.verify()).toBeNull();
  });

  it('should fail when the index is still inconsistent after a rebuild', async () => {
    const index = new SearchIndex(sourceOf([]));
    index.indexNote(makeNote('2024-01-01', 1, 'lost'));
    const state = (index as unknown as { state: { notes: Map<string, Note> } }).state;
    state.notes.delete('2024-01-01#1');
    const rebuild = vi.spyOn(index, 'rebuild').mockResolvedValue(undefined);

    await expect(index.query('lost')).rejects.toBeInstanceOf(IndexCorruptionError);
    expect(rebuild).toHaveBeenCalledTimes(1);
  });

  it('should refresh attachment state without changing matches', async () => {
    const index = indexed();
    const attachment: Attachment = {
      id: '2024-01-02.2.1',
      noteId: { day: '2024-01-02', seq: 2 },
      ordinal: 1,
      url: 'https://example.com/plan',
      kind: 'page-snapshot',
      attempts: 1,
      updatedAt: '2024-01-02T12:00:00.000Z',
      status: 'done',
      path: 'webpages/plan.html',
    };
    index.applyAttachment(attachment);

    const [note] = await index.query('plan');
    expect(note?.attachments).toEqual([attachment]);
  });
});
