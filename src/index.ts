// Load environment variables first
import 'dotenv/config';

import type { Server } from 'node:http';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { StorageError } from './utils/errors.js';
import { NoteStore } from './persistence/NoteStore.js';
import { SearchIndex } from './core/search/SearchIndex.js';
import { CaptureOrchestrator } from './core/capture/CaptureOrchestrator.js';
import { NotesService } from './core/notes/NotesService.js';
import { StartupCoordinator } from './core/recovery/StartupCoordinator.js';
import { PageArchiverAdapter } from './adapters/capture/PageArchiverAdapter.js';
import { MediaDownloaderAdapter } from './adapters/capture/MediaDownloaderAdapter.js';
import { CaptureRetryJob } from './scheduler/CaptureRetryJob.js';
import { scheduleCaptureRetry } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info({ notesDir: config.notesDir, attachmentsDir: config.attachmentsDir }, 'Starting notebox');

  const store = new NoteStore({ rootDir: config.notesDir, timezone: config.timezone });
  const index = new SearchIndex(store);
  const orchestrator = new CaptureOrchestrator(
    store,
    {
      'page-snapshot': new PageArchiverAdapter(config.pageArchiverCommand),
      'media-file': new MediaDownloaderAdapter(config.mediaDownloaderCommand),
    },
    {
      attachmentsDir: config.attachmentsDir,
      concurrency: config.captureConcurrency,
      maxAttempts: config.captureMaxAttempts,
      backoffMs: config.captureBackoffMs,
      backoffMaxMs: config.captureBackoffMaxMs,
      timeouts: {
        'page-snapshot': config.pageCaptureTimeoutMs,
        'media-file': config.mediaCaptureTimeoutMs,
      },
      detector: { mediaHosts: config.mediaHosts, mode: config.captureMode },
    }
  );
  const service = new NotesService(store, index, orchestrator, config.attachmentsDir);

  try {
    await new StartupCoordinator(store, index, orchestrator).start();
  } catch (error) {
    if (error instanceof StorageError) {
      logger.fatal({ error }, 'Cannot open note storage');
      process.exit(1);
    }
    throw error;
  }

  const retryTask = config.captureRetrySchedule
    ? scheduleCaptureRetry(new CaptureRetryJob(orchestrator), config.captureRetrySchedule, config.timezone)
    : undefined;

  const server = await startServer(service, config.port, config.host, { uploadLimitBytes: config.uploadMaxBytes });
  logger.info({ host: config.host, port: config.port }, 'notebox ready');

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    retryTask?.stop();
    const serverClosed = closeServer(server).catch((error) => {
      logger.warn({ error }, 'HTTP server did not close cleanly');
    });
    server.closeIdleConnections();
    service
      .close(config.shutdownGraceMs)
      .then(() => serverClosed)
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((error) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start application');
  process.exit(1);
});
