import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CaptureRequest, CaptureToolPort, CaptureToolResult } from '../ports/CaptureToolPort.js';
import type { CaptureKind, Note } from '../core/notes/types.js';
import { NoteStore } from '../persistence/NoteStore.js';
import { CaptureOrchestrator } from '../core/capture/CaptureOrchestrator.js';
import type { CaptureOrchestratorOptions } from '../core/capture/CaptureOrchestrator.js';
import { DEFAULT_MEDIA_HOSTS } from '../config/index.js';
import { extractTags } from '../core/search/tokenizer.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'notebox-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function fixedClock(iso: string): { now: () => Date; set: (next: string) => void } {
  let current = new Date(iso);
  return {
    now: () => current,
    set: (next: string) => {
      current = new Date(next);
    },
  };
}

export async function openStore(rootDir: string, now?: () => Date, timezone = 'UTC'): Promise<NoteStore> {
  const store = new NoteStore({ rootDir, timezone, now });
  await store.open();
  return store;
}

export function makeNote(day: string, seq: number, body: string): Note {
  return {
    id: { day, seq },
    createdAt: `${day}T12:00:00.000Z`,
    body,
    tags: extractTags(body),
    attachments: [],
  };
}

/**
 * ok: writes the artifact; fail: retryable non-zero exit; fatal: missing binary;
 * hang: never finishes on its own, only when its signal aborts.
 */
export type ToolStep = 'ok' | 'fail' | 'fatal' | 'hang';

export class FakeCaptureTool implements CaptureToolPort {
  readonly name: string;
  readonly calls: CaptureRequest[] = [];
  active = 0;
  maxActive = 0;
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(
    readonly kind: CaptureKind,
    private readonly steps: ToolStep[] = ['ok']
  ) {
    this.name = `fake-${kind}`;
  }

  /** Holds every call until `release()` is called. */
  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
  }

  async capture(request: CaptureRequest): Promise<CaptureToolResult> {
    this.calls.push(request);
    const step = this.steps[Math.min(this.calls.length, this.steps.length) - 1] ?? 'ok';
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.gate) {
        await this.gate;
      }
      switch (step) {
        case 'ok':
          await mkdir(dirname(request.destination), { recursive: true });
          await writeFile(request.destination, 'artifact');
          return { status: 'ok', path: request.destination };
        case 'fail':
          return { status: 'error', reason: 'tool exited with code 1', retryable: true };
        case 'fatal':
          return { status: 'error', reason: `Capture tool not found: ${this.name}`, retryable: false };
        case 'hang':
          return await new Promise<CaptureToolResult>((resolve) => {
            request.signal.addEventListener('abort', () =>
              resolve({ status: 'error', reason: 'Capture aborted', retryable: true })
            );
          });
      }
    } finally {
      this.active -= 1;
    }
  }
}

export interface OrchestratorFixture {
  orchestrator: CaptureOrchestrator;
  page: FakeCaptureTool;
  media: FakeCaptureTool;
  attachmentsDir: string;
}

export function makeOrchestrator(
  store: NoteStore,
  rootDir: string,
  tools: { page?: ToolStep[]; media?: ToolStep[] } = {},
  overrides: Partial<CaptureOrchestratorOptions> = {}
): OrchestratorFixture {
  const page = new FakeCaptureTool('page-snapshot', tools.page);
  const media = new FakeCaptureTool('media-file', tools.media);
  const attachmentsDir = join(rootDir, 'attachments');
  const orchestrator = new CaptureOrchestrator(
    store,
    { 'page-snapshot': page, 'media-file': media },
    {
      attachmentsDir,
      concurrency: 2,
      maxAttempts: 3,
      backoffMs: 1,
      backoffMaxMs: 5,
      timeouts: { 'page-snapshot': 5_000, 'media-file': 5_000 },
      detector: { mediaHosts: DEFAULT_MEDIA_HOSTS, mode: 'all' },
      ...overrides,
    }
  );
  return { orchestrator, page, media, attachmentsDir };
}
