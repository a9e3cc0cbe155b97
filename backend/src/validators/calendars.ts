import { z } from 'zod';

const unixSeconds = z
  .string()
  .regex(/^-?\d+$/, 'must be a unix timestamp in seconds')
  .transform((value) => new Date(Number.parseInt(value, 10) * 1000));

export const eventRangeQuerySchema = z.object({
  start_timestamp: unixSeconds,
  end_timestamp: unixSeconds,
  force_sync: z
    .string()
    .optional()
    .transform((value) => value === 'true')
});

export const calendarListQuerySchema = z.object({
  force_sync: z
    .string()
    .optional()
    .transform((value) => value === 'true')
});

export const calendarIdParamsSchema = z.object({
  calendarId: z.coerce.number().int().positive()
});

export const userIdParamsSchema = z.object({
  userId: z.coerce.number().int().positive()
});

export const calendarSettingsSchema = z
  .object({
    visibility: z.enum(['public', 'private']).optional(),
    redaction: z
      .string()
      .trim()
      .max(100)
      .nullable()
      .optional()
      .transform((value) => (value === '' ? null : value)),
    color: z.string().trim().max(32).nullable().optional()
  })
  .refine((value) => Object.values(value).some((entry) => entry !== undefined), {
    message: 'At least one of visibility, redaction or color is required'
  });

export const icsImportBodySchema = z.object({
  calendar_name: z.string().trim().max(255).optional(),
  ics_data: z.string().min(1, 'ICS data is required')
});

export const icsUploadFieldsSchema = z.object({
  calendar_name: z.string().trim().max(255).optional()
});
