import {z} from 'zod';

export const CookieSameSiteSchema = z.enum(['lax', 'strict', 'none']);
export type CookieSameSite = z.infer<typeof CookieSameSiteSchema>;

export const AccessGateSettingsSchema = z
  .object({
    tokenParam: z.string().min(1).default('token'),
    cookiePrefix: z.string().min(1).default('token_gate_'),
    cookie: z
      .object({
        maxAgeSeconds: z.number().int().min(0).default(60 * 60 * 24 * 365),
        httpOnly: z.boolean().default(true),
        secure: z.boolean().default(true),
        sameSite: CookieSameSiteSchema.default('lax')
      })
      .strict()
      .prefault({})
  })
  .strict();

export type AccessGateSettings = z.infer<typeof AccessGateSettingsSchema>;
export type AccessGateSettingsInput = z.input<typeof AccessGateSettingsSchema>;
