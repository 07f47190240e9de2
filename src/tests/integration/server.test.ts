import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createApp } from '../../server.js';
import { NotesService } from '../../core/notes/NotesService.js';
import { SearchIndex } from '../../core/search/SearchIndex.js';
import type { CaptureOrchestrator } from '../../core/capture/CaptureOrchestrator.js';
import type { Note } from '../../core/notes/types.js';
import { makeOrchestrator, makeTempDir, openStore, removeTempDir } from '../fixtures.js';

interface ErrorBody {
  error: string;
  code: string;
}

async function readJson<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

describe('HTTP API', () => {
  let rootDir: string;
  let server: Server;
  let baseUrl: string;
  let orchestrator: CaptureOrchestrator;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    const store = await openStore(rootDir, () => new Date('2024-01-01T10:00:00Z'));
    const fixture = makeOrchestrator(store, rootDir);
    orchestrator = fixture.orchestrator;
    const service = new NotesService(store, new SearchIndex(store), orchestrator, fixture.attachmentsDir);

    server = await new Promise<Server>((resolve) => {
      const listening = createApp(service, { uploadLimitBytes: 64 }).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const { port } = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await orchestrator.shutdown(100);
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    server.closeAllConnections();
    await closed;
    await removeTempDir(rootDir);
  });

  const postNote = (body: unknown): Promise<Response> =>
    fetch(`${baseUrl}/notes`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await readJson<{ status: string }>(response)).toMatchObject({ status: 'ok' });
    expect(response.headers.get('x-request-id')).toMatch(/^\d+-[a-z0-9]+$/);
  });

  it('creates a note, captures its link and serves the artifact', async () => {
    const created = await postNote({ body: 'Read https://example.com/article #reading' });
    expect(created.status).toBe(201);
    const note = await readJson<Note>(created);
    expect(note.id).toEqual({ day: '2024-01-01', seq: 1 });
    expect(note.tags).toEqual(['reading']);
    expect(note.attachments).toHaveLength(1);
    expect(note.attachments[0]?.kind).toBe('page-snapshot');

    await orchestrator.onIdle();

    const search = await fetch(`${baseUrl}/notes/search?q=${encodeURIComponent('#reading')}`);
    const results = await readJson<Note[]>(search);
    expect(results).toHaveLength(1);
    expect(results[0]?.attachments[0]?.status).toBe('done');

    const artifact = await fetch(`${baseUrl}/attachments/2024-01-01.1.1/artifact`);
    expect(artifact.status).toBe(200);
    expect(await artifact.text()).toBe('artifact');

    const retry = await fetch(`${baseUrl}/attachments/2024-01-01.1.1/retry`, { method: 'POST' });
    expect(retry.status).toBe(409);
    expect(await readJson<ErrorBody>(retry)).toMatchObject({ code: 'ATTACHMENT_STATE' });
  });

  it('accepts a bare JSON string as the body', async () => {
    const created = await postNote('plain thought');
    expect(created.status).toBe(201);

    const day = await fetch(`${baseUrl}/notes?day=2024-01-01`);
    expect((await readJson<Note[]>(day)).map((entry) => entry.body)).toEqual(['plain thought']);

    const single = await fetch(`${baseUrl}/notes/2024-01-01/1`);
    expect(single.status).toBe(200);
    expect((await readJson<Note>(single)).body).toBe('plain thought');
  });

  it('rejects an empty note', async () => {
    const response = await postNote({ body: '   ' });
    expect(response.status).toBe(400);
    expect(await readJson<ErrorBody>(response)).toEqual({ error: 'Note body must not be empty', code: 'VALIDATION_ERROR' });
  });

  it('rejects malformed identifiers', async () => {
    expect((await fetch(`${baseUrl}/notes/yesterday/1`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/notes?day=01-01-2024`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/attachments/nope`)).status).toBe(400);
  });

  it('returns 404 for unknown notes and attachments', async () => {
    expect((await fetch(`${baseUrl}/notes/2024-01-01/7`)).status).toBe(404);
    const response = await fetch(`${baseUrl}/attachments/2024-01-01.7.1`);
    expect(response.status).toBe(404);
    expect(await readJson<ErrorBody>(response)).toMatchObject({ code: 'NOT_FOUND' });
  });

  it('returns 400 for malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/notes`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"body":',
    });
    expect(response.status).toBe(400);
  });

  const upload = (name: string, body: string, contentType = 'text/plain'): Promise<Response> =>
    fetch(`${baseUrl}/upload?name=${encodeURIComponent(name)}`, {
      method: 'POST',
      headers: { 'Content-Type': contentType },
      body,
    });

  it('stores uploads under unique names and serves them', async () => {
    const first = await upload('todo.txt', 'first');
    expect(first.status).toBe(201);
    expect(await readJson<{ name: string; url: string }>(first)).toEqual({ name: 'todo.txt', url: '/uploads/todo.txt' });

    const second = await upload('todo.txt', '{"second":true}', 'application/json');
    expect(await readJson<{ name: string; url: string }>(second)).toEqual({
      name: 'todo-1.txt',
      url: '/uploads/todo-1.txt',
    });

    expect(await (await fetch(`${baseUrl}/uploads/todo.txt`)).text()).toBe('first');
    expect(await (await fetch(`${baseUrl}/uploads/todo-1.txt`)).text()).toBe('{"second":true}');
  });

  it('rejects uploads over the size limit', async () => {
    const response = await upload('big.bin', 'x'.repeat(65));
    expect(response.status).toBe(413);
    expect(await readJson<ErrorBody>(response)).toEqual({ error: 'request entity too large', code: 'REQUEST_REJECTED' });
    expect((await fetch(`${baseUrl}/uploads/big.bin`)).status).toBe(404);
  });

  it('rejects uploads without a name or content', async () => {
    const unnamed = await fetch(`${baseUrl}/upload`, { method: 'POST', body: 'data' });
    expect(unnamed.status).toBe(400);
    expect((await upload('empty.txt', '')).status).toBe(400);
  });

  it('does not serve paths outside the uploads directory', async () => {
    expect((await fetch(`${baseUrl}/uploads/${encodeURIComponent('../2024-01-01.jsonl')}`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/uploads/missing.txt`)).status).toBe(404);
  });
});
