import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { CaptureRetryJob } from './CaptureRetryJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleCaptureRetry(job: CaptureRetryJob, cronExpression: string, timezone: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid CAPTURE_RETRY_SCHEDULE: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Scheduling capture retry sweep');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error) => {
        logger.error({ error }, 'Capture retry sweep failed');
      });
    },
    { timezone }
  );
}
