import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { v4 as uuid } from 'uuid';
import { requireStore, type DocumentStore } from '../store/documentStore';
import type { TextExtractor } from '../services/textExtractor';
import { HttpError, InvalidArgumentError, MalformedInputError, sendError } from '../utils/errors';
import { Logger } from '../utils/Logger';

export interface UploadRouterOptions {
  store: DocumentStore | null;
  extractor: TextExtractor;
  maxUploadBytes: number;
}

export function createUploadRouter({ store, extractor, maxUploadBytes }: UploadRouterOptions) {
  const uploadRouter = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  uploadRouter.post('/extract-text', upload.single('file'), async (req, res) => {
    const transactionId = `extract-text-${uuid()}`;
    try {
      requireStore(store);
      const file = req.file;
      if (!file) {
        throw new InvalidArgumentError('No file provided');
      }

      let text: string;
      try {
        text = await extractor.extract(file.originalname || '', file.buffer);
      } catch (error) {
        throw error instanceof HttpError ? error : new MalformedInputError(error);
      }

      await Logger.logInfo('Upload', 'Text extracted', {
        TransactionID: transactionId,
        Endpoint: 'POST /upload/extract-text',
        Status: 'SUCCESS',
        ResponsePayload: { fileName: file.originalname, characters: text.length }
      });
      return res.json({ text });
    } catch (error) {
      await Logger.logBackendError('Upload', error, {
        TransactionID: transactionId,
        Endpoint: 'POST /upload/extract-text',
        Status: 'EXTRACTION_ERROR'
      });
      return sendError(res, error);
    }
  });

  // multer rejects oversized or unexpected uploads before the handler runs
  uploadRouter.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ detail: `Upload rejected: ${err.message}` });
    }
    return next(err);
  });

  return uploadRouter;
}
