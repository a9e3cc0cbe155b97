/**
 * Calendar APIs: imported calendars, event windows and ICS imports
 */
import express from 'express';
import multer from 'multer';
import {
  getCalendarEvents,
  getCalendars,
  patchCalendar,
  postIcsImport,
  removeCalendar
} from '../../controllers/api/calendars.js';
import { ensureAuthenticated } from '../../middleware/auth.js';

const router = express.Router();

// ICS uploads are held in memory (10MB)
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024
  }
});

router.use(ensureAuthenticated);

router.get('/', getCalendars);
router.get('/events', getCalendarEvents);
router.post('/ics', upload.single('ics_file'), postIcsImport);
router.patch('/:calendarId', patchCalendar);
router.delete('/:calendarId', removeCalendar);

export default router;
