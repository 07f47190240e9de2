import type { CaptureRequest, CaptureToolPort, CaptureToolResult } from '../../ports/CaptureToolPort.js';
import { createLogger } from '../../utils/logger.js';
import { runCaptureCommand } from './runCaptureCommand.js';

/** Saves a page as one self-contained offline HTML document (monolith by default). */
export class PageArchiverAdapter implements CaptureToolPort {
  readonly kind = 'page-snapshot';
  readonly name = 'page-archiver';
  private readonly logger = createLogger({ adapter: 'PageArchiverAdapter' });

  constructor(private readonly commandTemplate: string) {}

  async capture(request: CaptureRequest): Promise<CaptureToolResult> {
    const logger = this.logger.child({ method: 'capture', url: request.url });
    logger.info('Archiving page');
    const result = await runCaptureCommand(this.commandTemplate, request, logger);
    if (result.status === 'ok') {
      logger.info({ path: result.path }, 'Page archived');
    } else {
      logger.warn({ reason: result.reason, retryable: result.retryable }, 'Page archiving failed');
    }
    return result;
  }
}
