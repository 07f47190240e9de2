import { join } from 'node:path';
import type { Attachment, Note, NoteId } from './types.js';
import { noteKey } from './types.js';
import type { NoteStore } from '../../persistence/NoteStore.js';
import type { SearchIndex } from '../search/SearchIndex.js';
import type { CaptureOrchestrator } from '../capture/CaptureOrchestrator.js';
import { createLogger } from '../../utils/logger.js';
import { NotFoundError, ShuttingDownError, ValidationError } from '../../utils/errors.js';
import { Mutex } from '../../utils/mutex.js';
import { UploadStore } from '../../persistence/UploadStore.js';

export interface ResolvedArtifact {
  attachment: Attachment;
  /** The attachments directory. */
  root: string;
  /** Path relative to `root`. */
  relativePath: string;
  absolutePath: string;
}

export interface ResolvedUpload {
  /** The uploads directory. */
  root: string;
  name: string;
}

/**
 * Entry point for note operations. Appends and index updates share one writer lock,
 * so a note is always durable before it becomes searchable.
 */
export class NotesService {
  private readonly logger = createLogger({ service: 'NotesService' });
  private readonly writer = new Mutex();
  private readonly uploads: UploadStore;
  private closing = false;

  constructor(
    private readonly store: NoteStore,
    private readonly index: SearchIndex,
    private readonly orchestrator: CaptureOrchestrator,
    private readonly attachmentsDir: string
  ) {
    this.store.onChange((attachment) => this.index.applyAttachment(attachment));
    this.uploads = new UploadStore(join(attachmentsDir, 'uploads'));
  }

  async createNote(body: string): Promise<Note> {
    if (this.closing) {
      throw new ShuttingDownError();
    }
    if (body.trim() === '') {
      throw new ValidationError('Note body must not be empty');
    }

    const note = await this.writer.runExclusive(async () => {
      const appended = await this.store.append(body);
      this.index.indexNote(appended);
      return appended;
    });
    const logger = this.logger.child({ noteId: noteKey(note.id) });
    logger.info({ length: body.length, tags: note.tags }, 'Note created');

    let attachments: Attachment[] = [];
    try {
      attachments = await this.orchestrator.captureNote(note);
    } catch (error) {
      // The note itself is durable; missing attachments are recreated at the next startup.
      logger.error({ error }, 'Failed to enqueue captures for note');
    }
    if (attachments.length > 0) {
      logger.info({ attachments: attachments.map((attachment) => attachment.id) }, 'Captures enqueued');
    }
    return { ...note, attachments: this.store.attachmentsFor(note.id) };
  }

  search(query: string | string[]): Promise<Note[]> {
    return this.index.query(query);
  }

  readDay(day?: string): Promise<Note[]> {
    return this.store.readDay(day ?? this.store.currentDay());
  }

  async getNote(id: NoteId): Promise<Note> {
    const note = await this.store.getNote(id);
    if (!note) {
      throw new NotFoundError(`Note ${noteKey(id)} not found`);
    }
    return note;
  }

  getAttachment(attachmentId: string): Attachment {
    const attachment = this.store.getAttachment(attachmentId);
    if (!attachment) {
      throw new NotFoundError(`Attachment ${attachmentId} not found`);
    }
    return attachment;
  }

  resolveArtifact(attachmentId: string): ResolvedArtifact {
    const attachment = this.getAttachment(attachmentId);
    if (attachment.status !== 'done') {
      throw new NotFoundError(`Attachment ${attachmentId} has no artifact (status: ${attachment.status})`);
    }
    return {
      attachment,
      root: this.attachmentsDir,
      relativePath: attachment.path,
      absolutePath: join(this.attachmentsDir, attachment.path),
    };
  }

  /** Stores a user file and returns the name it was saved under. */
  async saveUpload(name: string, data: Buffer): Promise<string> {
    if (this.closing) {
      throw new ShuttingDownError();
    }
    if (data.length === 0) {
      throw new ValidationError('Upload must not be empty');
    }
    return this.uploads.save(name, data);
  }

  resolveUpload(name: string): ResolvedUpload {
    const stored = this.uploads.resolve(name);
    if (!stored) {
      throw new NotFoundError(`Upload ${name} not found`);
    }
    return { root: this.uploads.rootDir, name: stored };
  }

  retryAttachment(attachmentId: string): Promise<Attachment> {
    return this.orchestrator.retry(attachmentId);
  }

  async close(graceMs: number): Promise<void> {
    this.closing = true;
    // Let an append that already holds the writer lock finish before stopping captures.
    await this.writer.runExclusive(async () => undefined);
    await this.orchestrator.shutdown(graceMs);
  }
}
