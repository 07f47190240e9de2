import { join, relative } from 'node:path';
import type { Attachment, AttachmentUpdate, CaptureKind, Note } from '../notes/types.js';
import type { CaptureToolPort, CaptureToolResult } from '../../ports/CaptureToolPort.js';
import type { NoteStore } from '../../persistence/NoteStore.js';
import { createLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { AttachmentStateError, CaptureError, NotFoundError, ShuttingDownError } from '../../utils/errors.js';
import { sleep } from '../../utils/time.js';
import { relativeArtifactPath } from './artifactPaths.js';
import type { DetectedReference, DetectorOptions } from './referenceDetector.js';
import { detectReferences } from './referenceDetector.js';
import { WorkerPool } from './WorkerPool.js';

export type AttachmentStore = Pick<
  NoteStore,
  'createAttachment' | 'updateAttachment' | 'getAttachment' | 'listAttachments'
>;

export interface CaptureOrchestratorOptions {
  attachmentsDir: string;
  concurrency: number;
  maxAttempts: number;
  backoffMs: number;
  backoffMaxMs: number;
  timeouts: Record<CaptureKind, number>;
  detector: DetectorOptions;
}

type AttemptOutcome = CaptureToolResult | { status: 'interrupted' };

export class CaptureOrchestrator {
  private readonly logger = createLogger({ component: 'CaptureOrchestrator' });
  private readonly pool: WorkerPool;
  private readonly inFlight = new Set<string>();
  /** Fires when shutdown begins: cancels backoff waits. */
  private readonly stopping = new AbortController();
  /** Fires when the shutdown grace period ends: kills running tools. */
  private readonly killing = new AbortController();

  constructor(
    private readonly store: AttachmentStore,
    private readonly tools: Record<CaptureKind, CaptureToolPort>,
    private readonly options: CaptureOrchestratorOptions
  ) {
    this.pool = new WorkerPool(options.concurrency, (error) => {
      this.logger.error({ error }, 'Capture job crashed');
    });
  }

  get activeJobs(): number {
    return this.pool.active;
  }

  get queuedJobs(): number {
    return this.pool.waiting;
  }

  detectReferences(note: Note): DetectedReference[] {
    return detectReferences(note.body, this.options.detector);
  }

  async enqueueCapture(note: Note, url: string, kind: CaptureKind): Promise<Attachment> {
    if (this.stopping.signal.aborted) {
      throw new ShuttingDownError();
    }
    const attachment = await this.store.createAttachment(note.id, url, kind);
    this.schedule(attachment);
    return attachment;
  }

  /** Detects references in the note and enqueues one capture per distinct URL. */
  async captureNote(note: Note): Promise<Attachment[]> {
    const references = this.detectReferences(note);
    const attachments: Attachment[] = [];
    for (const reference of references) {
      attachments.push(await this.enqueueCapture(note, reference.url, reference.kind));
    }
    return attachments;
  }

  /** Moves a failed attachment back to pending and schedules it. */
  async retry(attachmentId: string): Promise<Attachment> {
    if (this.stopping.signal.aborted) {
      throw new ShuttingDownError();
    }
    const attachment = this.store.getAttachment(attachmentId);
    if (!attachment) {
      throw new NotFoundError(`Attachment ${attachmentId} not found`);
    }
    if (attachment.status === 'done') {
      throw new AttachmentStateError(`Attachment ${attachmentId} is already captured`);
    }
    const pending = attachment.status === 'failed' ? await this.reopen(attachment) : attachment;
    this.schedule(pending);
    return pending;
  }

  /** failed → pending. A concurrent retry that already reopened the attachment counts as success. */
  private async reopen(attachment: Attachment): Promise<Attachment> {
    try {
      return await this.store.updateAttachment(attachment.noteId, attachment.id, { status: 'pending' });
    } catch (error) {
      const current = this.store.getAttachment(attachment.id);
      if (error instanceof AttachmentStateError && current?.status === 'pending') {
        return current;
      }
      throw error;
    }
  }

  async retryFailed(): Promise<number> {
    const logger = this.logger.child({ method: 'retryFailed' });
    let retried = 0;
    for (const attachment of this.store.listAttachments('failed')) {
      try {
        await this.retry(attachment.id);
        retried += 1;
      } catch (error) {
        logger.error({ error, attachmentId: attachment.id }, 'Could not retry attachment');
      }
    }
    return retried;
  }

  /** Schedules attachments that are still pending, e.g. after a restart. */
  resume(attachments: readonly Attachment[]): number {
    let scheduled = 0;
    for (const attachment of attachments) {
      const current = this.store.getAttachment(attachment.id) ?? attachment;
      if (this.schedule(current)) {
        scheduled += 1;
      }
    }
    return scheduled;
  }

  onIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  /**
   * Stops taking jobs and gives running ones `graceMs` to finish, then kills their tools.
   * Interrupted and never-started jobs keep their attachments pending for the next start.
   */
  async shutdown(graceMs: number): Promise<void> {
    const logger = this.logger.child({ method: 'shutdown' });
    if (this.stopping.signal.aborted) {
      return this.pool.onIdle();
    }
    this.stopping.abort();
    const dropped = this.pool.stop();
    logger.info({ running: this.pool.active, dropped }, 'Capture orchestrator stopping');

    const idle = this.pool.onIdle();
    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    try {
      const finished = await Promise.race([idle.then(() => true), graceElapsed]);
      if (!finished) {
        logger.warn({ running: this.pool.active }, 'Grace period over; terminating capture tools');
        this.killing.abort();
        await idle;
      }
    } finally {
      clearTimeout(timer);
    }
    logger.info('Capture orchestrator stopped');
  }

  private schedule(attachment: Attachment): boolean {
    if (attachment.status !== 'pending' || this.inFlight.has(attachment.id) || this.stopping.signal.aborted) {
      return false;
    }
    this.inFlight.add(attachment.id);
    const accepted = this.pool.submit(() =>
      this.runJob(attachment.id).finally(() => {
        this.inFlight.delete(attachment.id);
      })
    );
    if (!accepted) {
      this.inFlight.delete(attachment.id);
    }
    return accepted;
  }

  private async runJob(attachmentId: string): Promise<void> {
    const attachment = this.store.getAttachment(attachmentId);
    if (!attachment || attachment.status !== 'pending') {
      return;
    }
    const logger = this.logger.child({ attachmentId, url: attachment.url, kind: attachment.kind });
    const tool = this.tools[attachment.kind];
    const destination = join(this.options.attachmentsDir, relativeArtifactPath(attachment.url, attachment.kind));
    const timeoutMs = this.options.timeouts[attachment.kind];

    let attempts = attachment.attempts;
    let lastError = 'capture did not run';
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      if (this.stopping.signal.aborted && attempt > 1) {
        logger.info('Shutdown in progress; leaving attachment pending');
        return;
      }
      attempts += 1;
      logger.info({ attempt, maxAttempts: this.options.maxAttempts }, 'Running capture');
      const outcome = await this.attemptOnce(tool, attachment.url, destination, timeoutMs);

      if (outcome.status === 'interrupted') {
        logger.info('Capture interrupted by shutdown; leaving attachment pending');
        return;
      }
      if (outcome.status === 'ok') {
        const path = relative(this.options.attachmentsDir, outcome.path);
        await this.settle(attachment, { status: 'done', path, attempts }, logger);
        return;
      }

      lastError = outcome.reason;
      if (!outcome.retryable) {
        logger.warn({ reason: outcome.reason }, 'Capture failed permanently');
        break;
      }
      if (attempt === this.options.maxAttempts) {
        logger.warn({ reason: outcome.reason, attempts }, 'Capture attempts exhausted');
        break;
      }

      const delay = this.backoffFor(attempt);
      logger.info({ reason: outcome.reason, retryInMs: delay }, 'Capture failed; retrying');
      try {
        await sleep(delay, this.stopping.signal);
      } catch {
        logger.info('Shutdown during backoff; leaving attachment pending');
        return;
      }
    }

    await this.settle(attachment, { status: 'failed', error: lastError, attempts }, logger);
  }

  private async attemptOnce(
    tool: CaptureToolPort,
    url: string,
    destination: string,
    timeoutMs: number
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutOutcome: AttemptOutcome = {
      status: 'error',
      reason: `${tool.name} timed out after ${timeoutMs} ms`,
      retryable: true,
    };
    const outcomeAfterAbort = (): AttemptOutcome => (timedOut ? timeoutOutcome : { status: 'interrupted' });

    const onKill = (): void => controller.abort();
    this.killing.signal.addEventListener('abort', onKill, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const aborted = new Promise<AttemptOutcome>((resolve) => {
      controller.signal.addEventListener('abort', () => resolve(outcomeAfterAbort()), { once: true });
    });

    try {
      if (this.killing.signal.aborted) {
        return { status: 'interrupted' };
      }
      const run = tool.capture({ url, destination, signal: controller.signal }).then(
        (result): AttemptOutcome => result,
        (error: unknown): AttemptOutcome => ({
          status: 'error',
          reason: `${tool.name} failed: ${error instanceof Error ? error.message : String(error)}`,
          retryable: error instanceof CaptureError ? error.retryable : true,
        })
      );
      const outcome = await Promise.race([run, aborted]);
      return controller.signal.aborted ? outcomeAfterAbort() : outcome;
    } finally {
      clearTimeout(timer);
      this.killing.signal.removeEventListener('abort', onKill);
    }
  }

  private backoffFor(attempt: number): number {
    return Math.min(this.options.backoffMs * 2 ** (attempt - 1), this.options.backoffMaxMs);
  }

  private async settle(attachment: Attachment, update: AttachmentUpdate, logger: Logger): Promise<void> {
    try {
      await this.store.updateAttachment(attachment.noteId, attachment.id, update);
    } catch (error) {
      if (error instanceof NotFoundError) {
        logger.error({ error }, 'Capture finished for an attachment the store does not know');
        return;
      }
      logger.error({ error, status: update.status }, 'Failed to record capture outcome; attachment stays pending');
    }
  }
}
