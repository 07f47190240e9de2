import type { NoteStore } from '../../persistence/NoteStore.js';
import type { SearchIndex } from '../search/SearchIndex.js';
import type { CaptureOrchestrator } from '../capture/CaptureOrchestrator.js';
import { createLogger } from '../../utils/logger.js';
import { IndexCorruptionError } from '../../utils/errors.js';

export interface RecoveryReport {
  days: number;
  notes: number;
  /** Pending attachments from the previous run that were scheduled again. */
  resumed: number;
  /** Attachments created for references that had none (crash between append and enqueue). */
  created: number;
}

export class StartupCoordinator {
  private readonly logger = createLogger({ component: 'StartupCoordinator' });

  constructor(
    private readonly store: NoteStore,
    private readonly index: SearchIndex,
    private readonly orchestrator: CaptureOrchestrator
  ) {}

  /** Opens the store, rebuilds the index and restarts unfinished captures. Store failures propagate. */
  async start(): Promise<RecoveryReport> {
    const logger = this.logger.child({ method: 'start' });
    await this.store.open();

    const days = await this.store.listDays();
    const notes = await this.store.readAll();
    await this.index.rebuild(notes);
    const problem = this.index.verify();
    if (problem) {
      logger.error({ error: new IndexCorruptionError(problem) }, 'Index inconsistent after replay; rebuilding');
      await this.index.rebuild();
    }

    const resumed = this.orchestrator.resume(this.store.listAttachments('pending'));
    const knownBefore = this.store.listAttachments().length;
    for (const note of notes) {
      try {
        await this.orchestrator.captureNote(note);
      } catch (error) {
        logger.error({ error, day: note.id.day, seq: note.id.seq }, 'Failed to reconcile captures for note');
      }
    }
    const created = this.store.listAttachments().length - knownBefore;

    const report: RecoveryReport = { days: days.length, notes: notes.length, resumed, created };
    logger.info(report, 'Startup recovery complete');
    return report;
  }
}
