import type { Request, Response } from 'express';
import {
  connectGoogleAccount,
  importRemoteCalendar,
  listRemoteCalendars
} from '../../../services/googleIntegrationService.js';
import { requireUser } from '../../../middleware/auth.js';
import { route } from '../../../utils/httpHandler.js';
import { validateBody } from '../../../utils/validation.js';
import { googleCalendarImportSchema, googleConnectSchema } from '../../../validators/googleIntegration.js';

export const connectGoogle = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const payload = validateBody(req, googleConnectSchema);
  const account = await connectGoogleAccount(user.id, payload);
  res.json({ connected: true, expiresAt: account.expiresAt?.toISOString() ?? null });
});

export const getGoogleCalendars = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const calendars = await listRemoteCalendars(user.id);
  res.json({ calendars });
});

export const importGoogleCalendar = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const { calendarId } = validateBody(req, googleCalendarImportSchema);
  const result = await importRemoteCalendar(user.id, calendarId);
  res.status(201).json(result);
});
