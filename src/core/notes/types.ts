export interface NoteId {
  day: string; // YYYY-MM-DD in the configured timezone
  seq: number; // 1-based, unique within the day
}

export type CaptureKind = 'page-snapshot' | 'media-file';

export const CAPTURE_KINDS: readonly CaptureKind[] = ['page-snapshot', 'media-file'];

export type AttachmentState =
  | { status: 'pending' }
  | { status: 'done'; path: string }
  | { status: 'failed'; error: string };

export type AttachmentStatus = AttachmentState['status'];

export type Attachment = {
  id: string;
  noteId: NoteId;
  ordinal: number;
  url: string;
  kind: CaptureKind;
  attempts: number;
  updatedAt: string;
} & AttachmentState;

/** Transition requested through `NoteStore.updateAttachment`. */
export type AttachmentUpdate =
  | { status: 'pending' }
  | { status: 'done'; path: string; attempts: number }
  | { status: 'failed'; error: string; attempts: number };

export interface Note {
  id: NoteId;
  createdAt: string;
  body: string;
  tags: string[];
  attachments: Attachment[];
}

export function noteKey(id: NoteId): string {
  return `${id.day}#${id.seq}`;
}

export function attachmentIdFor(id: NoteId, ordinal: number): string {
  return `${id.day}.${id.seq}.${ordinal}`;
}

const ATTACHMENT_ID_PATTERN = /^(\d{4}-\d{2}-\d{2})\.(\d+)\.(\d+)$/;

export function parseAttachmentId(id: string): { noteId: NoteId; ordinal: number } | null {
  const match = id.match(ATTACHMENT_ID_PATTERN);
  if (!match) {
    return null;
  }
  const [, day, seq, ordinal] = match;
  if (day === undefined || seq === undefined || ordinal === undefined) {
    return null;
  }
  return { noteId: { day, seq: Number(seq) }, ordinal: Number(ordinal) };
}

export function sameNote(a: NoteId, b: NoteId): boolean {
  return a.day === b.day && a.seq === b.seq;
}

/** Newest first: later day, then higher sequence. */
export function compareNewestFirst(a: Note, b: Note): number {
  if (a.id.day !== b.id.day) {
    return a.id.day < b.id.day ? 1 : -1;
  }
  return b.id.seq - a.id.seq;
}
