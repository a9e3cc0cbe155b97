import { z } from 'zod';

const eventDateSchema = z.object({
  date: z.string().optional(),
  dateTime: z.string().optional(),
  timeZone: z.string().optional()
});

export const remoteEventSchema = z.object({
  id: z.string().min(1),
  status: z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
  colorId: z.string().optional(),
  visibility: z.string().optional(),
  updated: z.string().optional(),
  start: eventDateSchema.optional(),
  end: eventDateSchema.optional()
});

export type RemoteEvent = z.infer<typeof remoteEventSchema>;
export type RemoteEventDate = z.infer<typeof eventDateSchema>;

// Items stay unknown here so one malformed entry cannot reject the page.
export const remoteEventsPageSchema = z.object({
  items: z.array(z.unknown()).optional(),
  nextPageToken: z.string().optional(),
  nextSyncToken: z.string().optional()
});

export const remoteCalendarEntrySchema = z.object({
  id: z.string().min(1),
  summary: z.string().optional(),
  summaryOverride: z.string().optional(),
  description: z.string().optional(),
  timeZone: z.string().optional(),
  backgroundColor: z.string().optional(),
  primary: z.boolean().optional(),
  accessRole: z.string().optional(),
  deleted: z.boolean().optional()
});

export type RemoteCalendarEntry = z.infer<typeof remoteCalendarEntrySchema>;

export const remoteCalendarListPageSchema = z.object({
  items: z.array(z.unknown()).optional(),
  nextPageToken: z.string().optional()
});

export const tokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional()
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const providerErrorSchema = z.object({
  error: z
    .union([
      z.string(),
      z.object({
        code: z.number().optional(),
        message: z.string().optional(),
        status: z.string().optional()
      })
    ])
    .optional(),
  error_description: z.string().optional()
});
