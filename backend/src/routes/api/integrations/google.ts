/**
 * Google Calendar integration APIs
 */
import express from 'express';
import {
  connectGoogle,
  getGoogleCalendars,
  importGoogleCalendar
} from '../../../controllers/api/integrations/google.js';
import { ensureAuthenticated } from '../../../middleware/auth.js';

const router = express.Router();

router.use(ensureAuthenticated);

router.post('/connect', connectGoogle);
router.get('/calendars', getGoogleCalendars);
router.post('/calendars/import', importGoogleCalendar);

export default router;
