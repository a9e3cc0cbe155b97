import { z } from 'zod';

export const googleConnectSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.coerce.date().optional(),
  expiresIn: z.coerce.number().int().nonnegative().optional()
});

export const googleCalendarImportSchema = z.object({
  calendarId: z.string().trim().min(1)
});
