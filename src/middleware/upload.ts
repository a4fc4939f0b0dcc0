import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

/**
 * Single in-memory file under `field`; multer errors (size, unexpected field) answer 400.
 * JSON requests pass through untouched.
 */
export function singleUpload(field: string): RequestHandler {
  const handler = upload.single(field);
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        const message = err.code === 'LIMIT_FILE_SIZE' ? 'File exceeds the 10 MB limit' : err.message;
        return res.status(400).json({ error: message, code: 'VALIDATION_ERROR' });
      }
      if (err) return next(err);
      next();
    });
  };
}
