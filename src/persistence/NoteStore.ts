import { mkdir, open, readdir, readFile, truncate } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  Attachment,
  AttachmentStatus,
  AttachmentUpdate,
  CaptureKind,
  Note,
  NoteId,
} from '../core/notes/types.js';
import { attachmentIdFor, noteKey, sameNote } from '../core/notes/types.js';
import { extractTags } from '../core/search/tokenizer.js';
import { createLogger } from '../utils/logger.js';
import { AttachmentStateError, NotFoundError, StorageError, ValidationError, isErrnoException } from '../utils/errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import { formatDay, isDay } from '../utils/time.js';
import type { DayRecord, FoldedDay } from './dayRecords.js';
import { DAY_FILE_EXTENSION, decodeDayFile, encodeRecord, foldDay, toAttachmentRecord } from './dayRecords.js';

export interface NoteStoreOptions {
  rootDir: string;
  timezone: string;
  now?: () => Date;
}

export type AttachmentListener = (attachment: Attachment) => void;

interface DayState {
  nextSeq: number;
  /** Set when a failed rollback may have left bytes behind; the tail is re-checked before the next write. */
  needsRepair: boolean;
}

/** Platforms that cannot open or fsync a directory report one of these. */
const DIR_SYNC_UNSUPPORTED = new Set(['EISDIR', 'EPERM', 'EINVAL']);

const ALLOWED_TRANSITIONS: Record<AttachmentStatus, readonly AttachmentStatus[]> = {
  pending: ['done', 'failed'],
  failed: ['pending'],
  done: [],
};

/**
 * Append-only note log, one `.jsonl` file per calendar day. Notes and attachment
 * snapshots are records in the day file of the note they belong to.
 */
export class NoteStore {
  private readonly logger = createLogger({ component: 'NoteStore' });
  private readonly rootDir: string;
  private readonly timezone: string;
  private readonly now: () => Date;
  private readonly dayLocks = new KeyedMutex();
  private readonly attachmentLocks = new KeyedMutex();
  private readonly days = new Map<string, DayState>();
  private readonly knownNotes = new Set<string>();
  private readonly attachments = new Map<string, Attachment>();
  private readonly attachmentsByNote = new Map<string, string[]>();
  private readonly listeners: AttachmentListener[] = [];
  private opened = false;

  constructor(options: NoteStoreOptions) {
    this.rootDir = options.rootDir;
    this.timezone = options.timezone;
    this.now = options.now ?? (() => new Date());
  }

  async open(): Promise<void> {
    const logger = this.logger.child({ method: 'open', rootDir: this.rootDir });
    try {
      await mkdir(this.rootDir, { recursive: true });
    } catch (error) {
      logger.fatal({ error }, 'Cannot open notes root');
      throw new StorageError(`Cannot open notes root ${this.rootDir}`, { cause: error });
    }

    this.days.clear();
    this.knownNotes.clear();
    this.attachments.clear();
    this.attachmentsByNote.clear();

    const days = await this.listDays();
    let notes = 0;
    for (const day of days) {
      await this.dayLocks.runExclusive(day, async () => {
        const folded = await this.loadDay(day, true);
        notes += folded.notes.length;
        for (const note of folded.notes) {
          this.knownNotes.add(noteKey(note.id));
        }
        for (const attachment of folded.attachments) {
          this.registerAttachment(attachment);
        }
      });
    }

    this.opened = true;
    logger.info({ days: days.length, notes, attachments: this.attachments.size }, 'Note store opened');
  }

  currentDay(): string {
    return formatDay(this.now(), this.timezone);
  }

  async append(body: string): Promise<Note> {
    this.assertOpen();
    const createdAt = this.now();
    const day = formatDay(createdAt, this.timezone);

    return this.dayLocks.runExclusive(day, async () => {
      const state = await this.prepareDay(day);
      const seq = state.nextSeq;
      await this.writeRecord(day, { type: 'note', seq, createdAt: createdAt.toISOString(), body });
      state.nextSeq = seq + 1;

      const note: Note = {
        id: { day, seq },
        createdAt: createdAt.toISOString(),
        body,
        tags: extractTags(body),
        attachments: [],
      };
      this.knownNotes.add(noteKey(note.id));
      this.logger.debug({ noteId: noteKey(note.id) }, 'Note appended');
      return note;
    });
  }

  async readDay(day: string): Promise<Note[]> {
    if (!isDay(day)) {
      throw new ValidationError(`Invalid day: ${day}`);
    }
    return this.dayLocks.runExclusive(day, async () => (await this.loadDay(day, false)).notes);
  }

  async listDays(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.rootDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageError('Failed to list day files', { cause: error });
    }
    return entries
      .filter((name) => name.endsWith(DAY_FILE_EXTENSION))
      .map((name) => name.slice(0, -DAY_FILE_EXTENSION.length))
      .filter(isDay)
      .sort();
  }

  async readAll(): Promise<Note[]> {
    const notes: Note[] = [];
    for (const day of await this.listDays()) {
      notes.push(...(await this.readDay(day)));
    }
    return notes;
  }

  async getNote(id: NoteId): Promise<Note | null> {
    if (!this.knownNotes.has(noteKey(id))) {
      return null;
    }
    const notes = await this.readDay(id.day);
    return notes.find((note) => note.id.seq === id.seq) ?? null;
  }

  hasNote(id: NoteId): boolean {
    return this.knownNotes.has(noteKey(id));
  }

  getAttachment(attachmentId: string): Attachment | undefined {
    return this.attachments.get(attachmentId);
  }

  listAttachments(status?: AttachmentStatus): Attachment[] {
    const all = [...this.attachments.values()];
    return status ? all.filter((attachment) => attachment.status === status) : all;
  }

  attachmentsFor(noteId: NoteId): Attachment[] {
    const ids = this.attachmentsByNote.get(noteKey(noteId)) ?? [];
    return ids.flatMap((id) => {
      const attachment = this.attachments.get(id);
      return attachment ? [attachment] : [];
    });
  }

  onChange(listener: AttachmentListener): void {
    this.listeners.push(listener);
  }

  /** Creates a pending attachment, or returns the existing one for the same note and URL. */
  async createAttachment(noteId: NoteId, url: string, kind: CaptureKind): Promise<Attachment> {
    this.assertOpen();
    const key = noteKey(noteId);
    if (!this.knownNotes.has(key)) {
      this.logger.error({ noteId: key, url }, 'Attachment requested for unknown note');
      throw new NotFoundError(`Note ${key} not found`);
    }

    // Creation is serialized per note so two enqueues of the same URL cannot both pass the dedupe check.
    return this.attachmentLocks.runExclusive(`note:${key}`, async () => {
      const existing = this.attachmentsFor(noteId).find((attachment) => attachment.url === url);
      if (existing) {
        return existing;
      }

      const ordinal = (this.attachmentsByNote.get(key)?.length ?? 0) + 1;
      const attachment: Attachment = {
        id: attachmentIdFor(noteId, ordinal),
        noteId,
        ordinal,
        url,
        kind,
        attempts: 0,
        updatedAt: this.now().toISOString(),
        status: 'pending',
      };
      await this.dayLocks.runExclusive(noteId.day, async () => {
        await this.prepareDay(noteId.day);
        await this.writeRecord(noteId.day, toAttachmentRecord(attachment));
      });
      this.registerAttachment(attachment);
      this.logger.info({ attachmentId: attachment.id, url, kind }, 'Attachment created');
      this.notify(attachment);
      return attachment;
    });
  }

  async updateAttachment(noteId: NoteId, attachmentId: string, update: AttachmentUpdate): Promise<Attachment> {
    this.assertOpen();
    return this.attachmentLocks.runExclusive(attachmentId, async () => {
      const current = this.attachments.get(attachmentId);
      if (!current || !sameNote(current.noteId, noteId)) {
        this.logger.error(
          { noteId: noteKey(noteId), attachmentId },
          'Attachment update references a missing record'
        );
        throw new NotFoundError(`Attachment ${attachmentId} of note ${noteKey(noteId)} not found`);
      }
      if (!ALLOWED_TRANSITIONS[current.status].includes(update.status)) {
        throw new AttachmentStateError(
          `Attachment ${attachmentId} cannot move from ${current.status} to ${update.status}`
        );
      }

      const next = applyUpdate(current, update, this.now().toISOString());
      await this.dayLocks.runExclusive(noteId.day, async () => {
        await this.prepareDay(noteId.day);
        await this.writeRecord(noteId.day, toAttachmentRecord(next));
      });
      this.attachments.set(next.id, next);
      this.logger.info({ attachmentId, from: current.status, to: next.status }, 'Attachment updated');
      this.notify(next);
      return next;
    });
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new StorageError('Note store is not open');
    }
  }

  private dayPath(day: string): string {
    return join(this.rootDir, `${day}${DAY_FILE_EXTENSION}`);
  }

  private registerAttachment(attachment: Attachment): void {
    this.attachments.set(attachment.id, attachment);
    const key = noteKey(attachment.noteId);
    const ids = this.attachmentsByNote.get(key) ?? [];
    if (!ids.includes(attachment.id)) {
      ids.push(attachment.id);
      ids.sort((a, b) => (this.attachments.get(a)?.ordinal ?? 0) - (this.attachments.get(b)?.ordinal ?? 0));
    }
    this.attachmentsByNote.set(key, ids);
  }

  private notify(attachment: Attachment): void {
    for (const listener of this.listeners) {
      try {
        listener(attachment);
      } catch (error) {
        this.logger.error({ error, attachmentId: attachment.id }, 'Attachment listener failed');
      }
    }
  }

  /** Must run under the day lock. */
  private async prepareDay(day: string): Promise<DayState> {
    const state = this.days.get(day);
    if (state && !state.needsRepair) {
      return state;
    }
    await this.loadDay(day, true);
    const loaded = this.days.get(day);
    if (!loaded) {
      throw new StorageError(`Day ${day} could not be prepared`);
    }
    return loaded;
  }

  /** Must run under the day lock. With `repair`, a torn trailing record is truncated away. */
  private async loadDay(day: string, repair: boolean): Promise<FoldedDay> {
    const logger = this.logger.child({ method: 'loadDay', day });
    const path = this.dayPath(day);

    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        content = Buffer.alloc(0);
      } else {
        logger.error({ error }, 'Failed to read day file');
        throw new StorageError(`Failed to read day file ${day}`, { cause: error });
      }
    }

    const decoded = decodeDayFile(content);
    if (decoded.invalidLines.length > 0) {
      logger.error({ lines: decoded.invalidLines }, 'Skipping unreadable records');
    }
    if (repair && decoded.tornBytes > 0) {
      const validLength = content.length - decoded.tornBytes;
      logger.warn({ tornBytes: decoded.tornBytes }, 'Truncating torn record at end of day file');
      try {
        await truncate(path, validLength);
      } catch (error) {
        throw new StorageError(`Failed to repair day file ${day}`, { cause: error });
      }
    }

    const folded = foldDay(day, decoded.records);
    if (folded.orphans.length > 0) {
      logger.error({ orphans: folded.orphans }, 'Attachment records without a matching note');
    }
    if (repair || !this.days.has(day)) {
      const previous = this.days.get(day);
      this.days.set(day, {
        nextSeq: Math.max(folded.maxSeq + 1, previous?.nextSeq ?? 1),
        needsRepair: repair ? false : previous?.needsRepair ?? true,
      });
    }
    return folded;
  }

  /**
   * Buffers the whole record, writes it in one call and fsyncs before returning.
   * On failure the file is cut back to its previous length so no partial record remains.
   */
  private async writeRecord(day: string, record: DayRecord): Promise<void> {
    const path = this.dayPath(day);
    const data = Buffer.from(encodeRecord(record), 'utf8');

    let handle: FileHandle;
    try {
      handle = await open(path, 'a');
    } catch (error) {
      this.logger.error({ error, day }, 'Failed to open day file');
      throw new StorageError(`Failed to open day file ${day}`, { cause: error });
    }

    try {
      let sizeBefore: number;
      try {
        sizeBefore = (await handle.stat()).size;
      } catch (error) {
        this.logger.error({ error, day }, 'Failed to stat day file; nothing written');
        throw new StorageError(`Failed to stat day file ${day}`, { cause: error });
      }

      try {
        await handle.write(data);
        await handle.sync();
        if (sizeBefore === 0) {
          // the file may be new: its directory entry has to reach the disk as well
          await this.syncRootDir();
        }
      } catch (error) {
        this.logger.error({ error, day, type: record.type }, 'Write failed; rolling back');
        await this.rollback(handle, day, sizeBefore);
        throw new StorageError(`Failed to write ${record.type} record to ${day}`, { cause: error });
      }
    } finally {
      await handle.close();
    }
  }

  private async rollback(handle: FileHandle, day: string, size: number): Promise<void> {
    try {
      await handle.truncate(size);
    } catch (error) {
      this.logger.error({ error, day }, 'Rollback failed; day file will be repaired');
      const state = this.days.get(day);
      if (state) {
        state.needsRepair = true;
      }
    }
  }

  private async syncRootDir(): Promise<void> {
    let dir: FileHandle;
    try {
      dir = await open(this.rootDir, 'r');
    } catch (error) {
      if (isErrnoException(error) && DIR_SYNC_UNSUPPORTED.has(error.code ?? '')) {
        this.logger.debug({ code: error.code }, 'Directory fsync not supported here');
        return;
      }
      throw error;
    }
    try {
      await dir.sync();
    } catch (error) {
      if (!(isErrnoException(error) && DIR_SYNC_UNSUPPORTED.has(error.code ?? ''))) {
        throw error;
      }
      this.logger.debug({ code: error.code }, 'Directory fsync not supported here');
    } finally {
      await dir.close();
    }
  }
}

function applyUpdate(current: Attachment, update: AttachmentUpdate, updatedAt: string): Attachment {
  const base = {
    id: current.id,
    noteId: current.noteId,
    ordinal: current.ordinal,
    url: current.url,
    kind: current.kind,
    updatedAt,
  };
  switch (update.status) {
    case 'pending':
      return { ...base, attempts: current.attempts, status: 'pending' };
    case 'done':
      return { ...base, attempts: update.attempts, status: 'done', path: update.path };
    case 'failed':
      return { ...base, attempts: update.attempts, status: 'failed', error: update.error };
  }
}
