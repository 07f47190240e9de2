import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UploadStore, numberedName, sanitizeUploadName } from '../../persistence/UploadStore.js';
import { StorageError, ValidationError } from '../../utils/errors.js';
import { makeTempDir, removeTempDir } from '../fixtures.js';

describe('sanitizeUploadName', () => {
  it.each([
    ['../x y.txt', 'x_y.txt'],
    ['C:\\docs\\plan.md', 'plan.md'],
    ['.env', 'env'],
    ['résumé.pdf', 'résumé.pdf'],
    ['a;b|c.sh', 'a_b_c.sh'],
  ])('should turn %j into %j', (input, expected) => {
    expect(sanitizeUploadName(input)).toBe(expected);
  });

  it.each(['..', 'dir/', ''])('should reject %j', (input) => {
    expect(() => sanitizeUploadName(input)).toThrow(ValidationError);
  });
});

describe('numberedName', () => {
  it('should put the counter before the last extension', () => {
    expect(numberedName('report.pdf', 0)).toBe('report.pdf');
    expect(numberedName('archive.tar.gz', 2)).toBe('archive.tar-2.gz');
    expect(numberedName('README', 1)).toBe('README-1');
  });
});

describe('UploadStore', () => {
  let rootDir: string;
  let store: UploadStore;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    store = new UploadStore(join(rootDir, 'uploads'));
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  it('should number colliding names instead of overwriting', async () => {
    expect(await store.save('note.txt', Buffer.from('a'))).toBe('note.txt');
    expect(await store.save('note.txt', Buffer.from('b'))).toBe('note-1.txt');
    expect(await store.save('../note.txt', Buffer.from('c'))).toBe('note-2.txt');

    expect(await readFile(join(store.rootDir, 'note.txt'), 'utf8')).toBe('a');
    expect(await readFile(join(store.rootDir, 'note-1.txt'), 'utf8')).toBe('b');
    expect(await readFile(join(store.rootDir, 'note-2.txt'), 'utf8')).toBe('c');
  });

  it('should give concurrent uploads of one name distinct files', async () => {
    const names = await Promise.all(['1', '2', '3'].map((body) => store.save('photo.jpg', Buffer.from(body))));

    expect([...names].sort()).toEqual(['photo-1.jpg', 'photo-2.jpg', 'photo.jpg']);
    expect((await readdir(store.rootDir)).sort()).toEqual(['photo-1.jpg', 'photo-2.jpg', 'photo.jpg']);
  });

  it('should raise StorageError when the directory cannot be created', async () => {
    await writeFile(join(rootDir, 'blocked'), 'file');
    const blocked = new UploadStore(join(rootDir, 'blocked', 'uploads'));

    await expect(blocked.save('note.txt', Buffer.from('a'))).rejects.toThrow(StorageError);
  });

  it('should only resolve names a save could produce', () => {
    expect(store.resolve('note-1.txt')).toBe('note-1.txt');
    expect(store.resolve('../note.txt')).toBeUndefined();
    expect(store.resolve('.hidden')).toBeUndefined();
    expect(store.resolve('')).toBeUndefined();
  });
});
