import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { requireStore, type DocumentStore } from '../store/documentStore';
import { signIn } from '../services/authService';
import { signInRequestSchema } from '../types/api';
import { fromZodError, sendError, statusOf } from '../utils/errors';
import { Logger } from '../utils/Logger';

export function createAuthRouter(store: DocumentStore | null) {
  const authRouter = Router();

  // Email-only sign-in; every call issues a fresh bearer token
  authRouter.post('/signin', async (req, res) => {
    const transactionId = `signin-${uuid()}`;
    try {
      const db = requireStore(store);
      const parsed = signInRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }

      const result = await signIn(db, parsed.data);

      await Logger.logInfo('Auth', 'User signed in', {
        TransactionID: transactionId,
        Endpoint: 'POST /auth/signin',
        UserID: result.user_id,
        Status: 'SUCCESS'
      });
      return res.json(result);
    } catch (error) {
      await Logger.logBackendError('Auth', error, {
        TransactionID: transactionId,
        Endpoint: 'POST /auth/signin',
        RequestPayload: { email: '***' },
        Status: statusOf(error) === 500 ? 'INTERNAL_ERROR' : 'VALIDATION_ERROR'
      });
      return sendError(res, error);
    }
  });

  return authRouter;
}
