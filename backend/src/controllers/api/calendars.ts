import type { Request, Response } from 'express';
import {
  deleteCalendar,
  getEventsWithSync,
  importIcsCalendar,
  listCalendars,
  updateCalendar
} from '../../services/calendarService.js';
import { requireUser } from '../../middleware/auth.js';
import { route } from '../../utils/httpHandler.js';
import { parseWithSchema, validateBody, validateParams, validateQuery } from '../../utils/validation.js';
import {
  calendarIdParamsSchema,
  calendarListQuerySchema,
  calendarSettingsSchema,
  eventRangeQuerySchema,
  icsImportBodySchema,
  icsUploadFieldsSchema
} from '../../validators/calendars.js';

export const getCalendars = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const { force_sync: force } = validateQuery(req, calendarListQuerySchema);
  const calendars = await listCalendars(user.id, { force });
  res.json({ calendars });
});

export const getCalendarEvents = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const query = validateQuery(req, eventRangeQuerySchema);
  const view = await getEventsWithSync(
    user.id,
    { start: query.start_timestamp, end: query.end_timestamp },
    { force: query.force_sync }
  );
  res.json(view);
});

/**
 * Accepts either a JSON body `{ calendar_name?, ics_data }` or a multipart
 * upload with an `ics_file` part and an optional `calendar_name` field.
 */
export const postIcsImport = route(async (req: Request, res: Response) => {
  const user = requireUser(req);

  let icsData: string;
  let calendarName: string | undefined;
  if (req.file) {
    icsData = req.file.buffer.toString('utf8');
    calendarName = parseWithSchema(req.body ?? {}, icsUploadFieldsSchema).calendar_name;
  } else {
    const body = validateBody(req, icsImportBodySchema);
    icsData = body.ics_data;
    calendarName = body.calendar_name;
  }

  const result = await importIcsCalendar(user.id, { icsData, calendarName: calendarName || null });
  res.status(201).json({
    message: 'ICS file imported successfully',
    calendar: result.calendar,
    eventsCount: result.eventsCount
  });
});

export const patchCalendar = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const { calendarId } = validateParams(req, calendarIdParamsSchema);
  const patch = validateBody(req, calendarSettingsSchema);
  const calendar = await updateCalendar(user.id, calendarId, patch);
  res.json({ calendar });
});

export const removeCalendar = route(async (req: Request, res: Response) => {
  const user = requireUser(req);
  const { calendarId } = validateParams(req, calendarIdParamsSchema);
  await deleteCalendar(user.id, calendarId);
  res.json({ success: true });
});
