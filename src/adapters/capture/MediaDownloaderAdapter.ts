import type { CaptureRequest, CaptureToolPort, CaptureToolResult } from '../../ports/CaptureToolPort.js';
import { createLogger } from '../../utils/logger.js';
import { runCaptureCommand } from './runCaptureCommand.js';

export class MediaDownloaderAdapter implements CaptureToolPort {
  readonly kind = 'media-file';
  readonly name = 'media-downloader';
  private readonly logger = createLogger({ adapter: 'MediaDownloaderAdapter' });

  constructor(private readonly commandTemplate: string) {}

  async capture(request: CaptureRequest): Promise<CaptureToolResult> {
    const logger = this.logger.child({ method: 'capture', url: request.url });
    logger.info('Downloading media');
    const startedAt = Date.now();
    const result = await runCaptureCommand(this.commandTemplate, request, logger);
    if (result.status === 'ok') {
      logger.info({ path: result.path, ms: Date.now() - startedAt }, 'Media downloaded');
    } else {
      logger.warn({ reason: result.reason, retryable: result.retryable }, 'Media download failed');
    }
    return result;
  }
}
