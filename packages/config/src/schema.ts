import { z } from 'zod';

// YAML leaves empty keys as null; treat them the same as a missing key.
const optionalInt = (schema: z.ZodNumber) => schema.int().nullish();

// Timer delays past 2^31-1 ms fire immediately, so keep timeouts well below that.
export const MAX_TIMEOUT_SECONDS = 3600;

export const siteConfigSchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  expected_status: optionalInt(z.number()),
  keyword: z.string().nullish(),
  disabled: z.boolean().nullish(),
  timeout: optionalInt(z.number().positive().max(MAX_TIMEOUT_SECONDS)),
  retries: optionalInt(z.number().min(0)),
});
export type SiteConfig = z.infer<typeof siteConfigSchema>;

export const defaultsConfigSchema = z.object({
  timeout: optionalInt(z.number().positive().max(MAX_TIMEOUT_SECONDS)),
  retries: optionalInt(z.number().min(0)),
  // Entries are validated one by one later; malformed ones are dropped, not rejected.
  allow_status_ranges: z.array(z.unknown()).nullish(),
});
export type DefaultsConfig = z.infer<typeof defaultsConfigSchema>;

export const sitesConfigSchema = z.object({
  sites: z
    .array(siteConfigSchema)
    .nullish()
    .transform((v) => v ?? []),
  defaults: defaultsConfigSchema.nullish().transform((v) => v ?? {}),
});
export type SitesConfig = z.infer<typeof sitesConfigSchema>;

export const slackWebhookUrlSchema = z
  .string()
  .url()
  .refine((val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      return false;
    }
  }, 'url protocol must be http or https');
