import { mkdir, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { StorageError, ValidationError, isErrnoException } from '../utils/errors.js';

const MAX_NAME_ATTEMPTS = 10_000;

/**
 * Reduces a client-supplied file name to a single safe path segment.
 * Directory parts are dropped and anything outside letters, digits, `.`, `_` and `-` becomes `_`.
 */
export function sanitizeUploadName(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  const cleaned = base
    .normalize('NFC')
    .replace(/[^\p{L}\p{N}._-]/gu, '_')
    .replace(/^\.+|\.+$/g, '');
  if (!cleaned) {
    throw new ValidationError(`Unusable upload name: ${JSON.stringify(name)}`);
  }
  return cleaned;
}

/** `report.pdf`, then `report-1.pdf`, `report-2.pdf`, ... */
export function numberedName(name: string, counter: number): string {
  if (counter === 0) {
    return name;
  }
  const ext = extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return `${stem}-${counter}${ext}`;
}

export class UploadStore {
  private readonly logger = createLogger({ component: 'UploadStore' });

  constructor(readonly rootDir: string) {}

  /** Writes `data` under a name no earlier upload holds and returns that name. */
  async save(requestedName: string, data: Buffer): Promise<string> {
    const name = sanitizeUploadName(requestedName);
    const logger = this.logger.child({ method: 'save', name });

    try {
      await mkdir(this.rootDir, { recursive: true });
    } catch (error) {
      logger.error({ error }, 'Failed to create uploads directory');
      throw new StorageError(`Cannot create uploads directory ${this.rootDir}`, { cause: error });
    }

    for (let counter = 0; counter < MAX_NAME_ATTEMPTS; counter++) {
      const candidate = numberedName(name, counter);
      try {
        // wx fails on an existing file, so two uploads never share a name
        await writeFile(join(this.rootDir, candidate), data, { flag: 'wx' });
        logger.info({ storedAs: candidate, bytes: data.length }, 'Upload saved');
        return candidate;
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          continue;
        }
        logger.error({ error, candidate }, 'Failed to write upload');
        throw new StorageError(`Failed to save upload ${candidate}`, { cause: error });
      }
    }

    throw new StorageError(`No free name left for upload ${name}`);
  }

  /** Returns the stored name if it is one `save` could have produced, else `undefined`. */
  resolve(name: string): string | undefined {
    try {
      return sanitizeUploadName(name) === name ? name : undefined;
    } catch {
      return undefined;
    }
  }
}
