import type { NextFunction, Request, Response, Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { NotesService } from '../../core/notes/NotesService.js';
import { parseAttachmentId } from '../../core/notes/types.js';
import { createLogger } from '../../utils/logger.js';
import { NoteboxError, NotFoundError, ValidationError, isErrnoException } from '../../utils/errors.js';

const createNoteSchema = z.union([z.string(), z.object({ body: z.string() })]);
const dayParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'day must be YYYY-MM-DD');
const seqParam = z.coerce.number().int().positive();

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ATTACHMENT_STATE: 409,
  SHUTTING_DOWN: 503,
  INDEX_CORRUPTION: 503,
};

export function statusForError(error: unknown): number {
  if (error instanceof NoteboxError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  // body-parser rejections (413, 415, ...) carry their own status
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : 500;
  }
  return 500;
}

export const DEFAULT_UPLOAD_LIMIT_BYTES = 500 * 1024 * 1024;

export interface NotesRouterOptions {
  uploadLimitBytes?: number;
}

function queryTerms(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((term): term is string => typeof term === 'string');
  }
  return [];
}

function attachmentIdParam(req: Request): string {
  const id = req.params.id ?? '';
  if (!parseAttachmentId(id)) {
    throw new ValidationError(`Malformed attachment id: ${id}`);
  }
  return id;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function sendFromRoot(res: Response, path: string, root: string, missing: (error: Error) => Error): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    res.sendFile(path, { root, dotfiles: 'deny' }, (error) => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        reject(missing(error));
      } else if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export function createNotesRouter(service: NotesService, options: NotesRouterOptions = {}): Router {
  const logger = createLogger({ component: 'notesRouter' });
  const router = express.Router();

  const handle =
    (handler: AsyncHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };

  router.post(
    '/notes',
    handle(async (req, res) => {
      const parsed = createNoteSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Expected a JSON string or {"body": string}');
      }
      const body = typeof parsed.data === 'string' ? parsed.data : parsed.data.body;
      const note = await service.createNote(body);
      res.status(201).json(note);
    })
  );

  router.get(
    '/notes/search',
    handle(async (req, res) => {
      const terms = queryTerms(req.query.q);
      res.status(200).json(await service.search(terms));
    })
  );

  router.get(
    '/notes',
    handle(async (req, res) => {
      const day = req.query.day;
      if (day !== undefined && !dayParam.safeParse(day).success) {
        throw new ValidationError('day must be YYYY-MM-DD');
      }
      res.status(200).json(await service.readDay(typeof day === 'string' ? day : undefined));
    })
  );

  router.get(
    '/notes/:day/:seq',
    handle(async (req, res) => {
      const day = dayParam.safeParse(req.params.day);
      const seq = seqParam.safeParse(req.params.seq);
      if (!day.success || !seq.success) {
        throw new ValidationError('Expected /notes/YYYY-MM-DD/<seq>');
      }
      res.status(200).json(await service.getNote({ day: day.data, seq: seq.data }));
    })
  );

  router.get(
    '/attachments/:id',
    handle(async (req, res) => {
      res.status(200).json(service.getAttachment(attachmentIdParam(req)));
    })
  );

  router.get(
    '/attachments/:id/artifact',
    handle(async (req, res) => {
      const artifact = service.resolveArtifact(attachmentIdParam(req));
      await sendFromRoot(
        res,
        artifact.relativePath,
        artifact.root,
        (error) => new NotFoundError(`Artifact file for ${artifact.attachment.id} is missing`, { cause: error })
      );
    })
  );

  router.post(
    '/attachments/:id/retry',
    handle(async (req, res) => {
      const attachment = await service.retryAttachment(attachmentIdParam(req));
      res.status(202).json(attachment);
    })
  );

  router.post(
    '/upload',
    express.raw({ type: () => true, limit: options.uploadLimitBytes ?? DEFAULT_UPLOAD_LIMIT_BYTES }),
    handle(async (req, res) => {
      const name = req.query.name;
      if (typeof name !== 'string' || name === '') {
        throw new ValidationError('Expected ?name=<file name>');
      }
      if (!Buffer.isBuffer(req.body)) {
        throw new ValidationError('Upload must not be empty');
      }
      const stored = await service.saveUpload(name, req.body);
      res.status(201).json({ name: stored, url: `/uploads/${encodeURIComponent(stored)}` });
    })
  );

  router.get(
    '/uploads/:name',
    handle(async (req, res) => {
      const upload = service.resolveUpload(req.params.name ?? '');
      await sendFromRoot(
        res,
        upload.name,
        upload.root,
        (error) => new NotFoundError(`Upload ${upload.name} not found`, { cause: error })
      );
    })
  );

  router.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusForError(error);
    const code = error instanceof NoteboxError ? error.code : status < 500 ? 'REQUEST_REJECTED' : 'INTERNAL';
    if (status >= 500) {
      logger.error({ error, method: req.method, path: req.path }, 'Request failed');
    } else {
      logger.info({ method: req.method, path: req.path, code }, 'Request rejected');
    }
    const message = status >= 500 && !(error instanceof NoteboxError) ? 'Internal server error' : errorMessage(error);
    res.status(status).json({ error: message, code });
  });

  return router;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
