import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { requireStore, type DocumentStore } from '../store/documentStore';
import { getProfileBySlug, saveProfile } from '../services/profileService';
import { saveProfileRequestSchema } from '../types/api';
import { fromZodError, sendError } from '../utils/errors';
import { Logger } from '../utils/Logger';

export function createProfileRouter(store: DocumentStore | null) {
  const profileRouter = Router();

  profileRouter.post('/', async (req, res) => {
    const transactionId = `save-profile-${uuid()}`;
    try {
      const db = requireStore(store);
      const parsed = saveProfileRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }

      const result = await saveProfile(db, parsed.data);

      await Logger.logInfo('Profile', 'Profile saved', {
        TransactionID: transactionId,
        Endpoint: 'POST /profile',
        UserID: parsed.data.user_id,
        RelatedTo: result.profile_id,
        Status: 'SUCCESS'
      });
      return res.json(result);
    } catch (error) {
      await Logger.logBackendError('Profile', error, {
        TransactionID: transactionId,
        Endpoint: 'POST /profile',
        Status: 'SAVE_ERROR'
      });
      return sendError(res, error);
    }
  });

  profileRouter.get('/:slug', async (req, res) => {
    const transactionId = `get-profile-${uuid()}`;
    try {
      const db = requireStore(store);
      const profile = await getProfileBySlug(db, req.params.slug);
      return res.json(profile);
    } catch (error) {
      await Logger.logBackendError('Profile', error, {
        TransactionID: transactionId,
        Endpoint: 'GET /profile/:slug',
        RelatedTo: req.params.slug,
        Status: 'LOOKUP_ERROR'
      });
      return sendError(res, error);
    }
  });

  return profileRouter;
}
