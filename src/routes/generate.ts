import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { generateContent } from '../services/contentGenerator';
import { generateRequestSchema, type GenerateRequest } from '../types/api';
import { fromZodError, sendError } from '../utils/errors';
import { Logger } from '../utils/Logger';

export function createGenerateRouter() {
  const generateRouter = Router();

  generateRouter.post('/', async (req, res) => {
    const transactionId = `generate-${uuid()}`;
    try {
      const parsed = generateRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }
      const { user_id, job_description, user_material }: GenerateRequest = parsed.data;
      const content = generateContent(job_description, user_material);

      await Logger.logInfo('Generate', 'Resume content generated', {
        TransactionID: transactionId,
        Endpoint: 'POST /generate',
        UserID: user_id,
        Status: 'SUCCESS',
        ResponsePayload: { bullets: content.bullets.length }
      });
      return res.json(content);
    } catch (error) {
      await Logger.logBackendError('Generate', error, {
        TransactionID: transactionId,
        Endpoint: 'POST /generate',
        Status: 'VALIDATION_ERROR'
      });
      return sendError(res, error);
    }
  });

  return generateRouter;
}
