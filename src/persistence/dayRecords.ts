import { z } from 'zod';
import type { Attachment, Note } from '../core/notes/types.js';
import { attachmentIdFor } from '../core/notes/types.js';
import { extractTags } from '../core/search/tokenizer.js';

export const DAY_FILE_EXTENSION = '.jsonl';

const noteRecordSchema = z.object({
  type: z.literal('note'),
  seq: z.number().int().positive(),
  createdAt: z.string().min(1),
  body: z.string(),
});

const attachmentRecordSchema = z.object({
  type: z.literal('attachment'),
  id: z.string().min(1),
  seq: z.number().int().positive(),
  ordinal: z.number().int().positive(),
  url: z.string().min(1),
  kind: z.enum(['page-snapshot', 'media-file']),
  status: z.enum(['pending', 'done', 'failed']),
  path: z.string().min(1).optional(),
  error: z.string().optional(),
  attempts: z.number().int().nonnegative(),
  updatedAt: z.string().min(1),
});

const dayRecordSchema = z.discriminatedUnion('type', [noteRecordSchema, attachmentRecordSchema]);

export type NoteRecord = z.infer<typeof noteRecordSchema>;
export type AttachmentRecord = z.infer<typeof attachmentRecordSchema>;
export type DayRecord = z.infer<typeof dayRecordSchema>;

export interface DecodedDayFile {
  records: DayRecord[];
  /** Complete lines that failed to parse or validate. */
  invalidLines: number[];
  /** Bytes belonging to a trailing line without its newline terminator. */
  tornBytes: number;
}

export function encodeRecord(record: DayRecord): string {
  return `${JSON.stringify(record)}\n`;
}

export function decodeDayFile(content: Buffer): DecodedDayFile {
  const lastNewline = content.lastIndexOf(0x0a);
  const complete = content.subarray(0, lastNewline + 1).toString('utf8');
  const records: DayRecord[] = [];
  const invalidLines: number[] = [];

  const lines = complete.split('\n');
  lines.pop(); // empty string after the final terminator
  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      invalidLines.push(index + 1);
      return;
    }
    const parsed = dayRecordSchema.safeParse(json);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      invalidLines.push(index + 1);
    }
  });

  return { records, invalidLines, tornBytes: content.length - (lastNewline + 1) };
}

export function toAttachmentRecord(attachment: Attachment): AttachmentRecord {
  const record: AttachmentRecord = {
    type: 'attachment',
    id: attachment.id,
    seq: attachment.noteId.seq,
    ordinal: attachment.ordinal,
    url: attachment.url,
    kind: attachment.kind,
    status: attachment.status,
    attempts: attachment.attempts,
    updatedAt: attachment.updatedAt,
  };
  if (attachment.status === 'done') {
    record.path = attachment.path;
  } else if (attachment.status === 'failed') {
    record.error = attachment.error;
  }
  return record;
}

/** Returns null when the record's status lacks the field that status requires. */
export function fromAttachmentRecord(day: string, record: AttachmentRecord): Attachment | null {
  const base = {
    id: record.id,
    noteId: { day, seq: record.seq },
    ordinal: record.ordinal,
    url: record.url,
    kind: record.kind,
    attempts: record.attempts,
    updatedAt: record.updatedAt,
  };
  switch (record.status) {
    case 'pending':
      return { ...base, status: 'pending' };
    case 'done':
      return record.path === undefined ? null : { ...base, status: 'done', path: record.path };
    case 'failed':
      return { ...base, status: 'failed', error: record.error ?? 'unknown error' };
  }
}

export interface FoldedDay {
  notes: Note[];
  attachments: Attachment[];
  maxSeq: number;
  /** Attachment records pointing at a note the file does not contain. */
  orphans: string[];
}

/**
 * Folds records into notes in append order. Attachment records are full snapshots,
 * so the last record for an id wins.
 */
export function foldDay(day: string, records: DayRecord[]): FoldedDay {
  const notes = new Map<number, Note>();
  const attachments = new Map<string, Attachment>();
  const orphans: string[] = [];
  let maxSeq = 0;

  for (const record of records) {
    if (record.type === 'note') {
      if (notes.has(record.seq)) {
        continue;
      }
      notes.set(record.seq, {
        id: { day, seq: record.seq },
        createdAt: record.createdAt,
        body: record.body,
        tags: extractTags(record.body),
        attachments: [],
      });
      maxSeq = Math.max(maxSeq, record.seq);
      continue;
    }
    const attachment = fromAttachmentRecord(day, record);
    if (!attachment || attachment.id !== attachmentIdFor(attachment.noteId, attachment.ordinal)) {
      orphans.push(record.id);
      continue;
    }
    attachments.set(attachment.id, attachment);
  }

  for (const attachment of attachments.values()) {
    const note = notes.get(attachment.noteId.seq);
    if (note) {
      note.attachments.push(attachment);
    } else {
      orphans.push(attachment.id);
    }
  }
  for (const note of notes.values()) {
    note.attachments.sort((a, b) => a.ordinal - b.ordinal);
  }

  return {
    notes: [...notes.values()],
    attachments: [...attachments.values()].filter((attachment) => notes.has(attachment.noteId.seq)),
    maxSeq,
    orphans,
  };
}
