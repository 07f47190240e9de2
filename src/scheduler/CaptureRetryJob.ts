import type { CaptureOrchestrator } from '../core/capture/CaptureOrchestrator.js';
import { createLogger } from '../utils/logger.js';

/** Puts failed captures back in the queue, e.g. once a night after a tool was fixed or a site came back. */
export class CaptureRetryJob {
  private readonly logger = createLogger({ job: 'CaptureRetryJob' });
  private running = false;

  constructor(private readonly orchestrator: Pick<CaptureOrchestrator, 'retryFailed'>) {}

  async run(): Promise<number> {
    const logger = this.logger.child({ method: 'run' });
    if (this.running) {
      logger.warn('Previous retry sweep still running; skipping');
      return 0;
    }
    this.running = true;
    try {
      const retried = await this.orchestrator.retryFailed();
      logger.info({ retried }, 'Failed captures re-enqueued');
      return retried;
    } finally {
      this.running = false;
    }
  }
}
