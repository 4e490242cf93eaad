import {z} from 'zod';

const IsoDateTimeSchema = z.iso.datetime({offset: true});

export const AccessTokenValueSchema = z
  .string()
  .min(32)
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/u);

export const AccessTokenRecordSchema = z
  .object({
    id: z.string().min(1),
    description: z.string().min(1).max(255),
    path: z.string().min(1).max(255),
    token: AccessTokenValueSchema,
    is_valid: z.boolean(),
    expires_at: IsoDateTimeSchema.optional(),
    max_uses: z.number().int().min(0).optional(),
    created_at: IsoDateTimeSchema,
    times_accessed: z.number().int().min(0),
    last_accessed: IsoDateTimeSchema.optional()
  })
  .strict();

export type AccessTokenRecord = z.infer<typeof AccessTokenRecordSchema>;

export const IssueAccessTokenInputSchema = z
  .object({
    description: z.string().trim().min(1).max(255),
    path: z.string().min(1).max(255),
    expires_at: IsoDateTimeSchema.optional(),
    max_uses: z.number().int().min(0).optional(),
    token: AccessTokenValueSchema.optional()
  })
  .strict();

export type IssueAccessTokenInput = z.input<typeof IssueAccessTokenInputSchema>;

export const AccessTokenIdSchema = z.string().trim().min(1);

export const ConsumeAccessTokenInputSchema = z
  .object({
    token: z.string().min(1),
    path: z.string().min(1),
    now: z.date()
  })
  .strict();

export type ConsumeAccessTokenInput = z.infer<typeof ConsumeAccessTokenInputSchema>;
