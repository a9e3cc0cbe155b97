import type { Request, Response } from 'express';
import { findUserById } from '../../db/queries.js';
import { getPublicEvents } from '../../services/calendarService.js';
import { NotFoundError } from '../../utils/errors.js';
import { route } from '../../utils/httpHandler.js';
import { validateParams, validateQuery } from '../../utils/validation.js';
import { eventRangeQuerySchema, userIdParamsSchema } from '../../validators/calendars.js';

export const getUserPublicEvents = route(async (req: Request, res: Response) => {
  const { userId } = validateParams(req, userIdParamsSchema);
  const query = validateQuery(req, eventRangeQuerySchema);

  const user = await findUserById(userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }

  const calendars = await getPublicEvents(user.id, { start: query.start_timestamp, end: query.end_timestamp });
  res.json({
    user: { id: user.id, username: user.username, displayName: user.displayName },
    calendars
  });
});
