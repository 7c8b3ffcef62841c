import yaml from 'js-yaml';
import { z } from 'zod';

import { sitesConfigSchema, type SitesConfig } from './schema';

export class ConfigDocumentError extends Error {
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigDocumentError';
  }
}

export function parseDocument<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  opts: { source?: string } = {},
): T {
  const source = opts.source ?? 'document';

  let parsed: unknown;
  try {
    parsed = yaml.load(text, { filename: source }) as unknown;
  } catch (err) {
    throw new ConfigDocumentError(source, `Invalid YAML in ${source}: ${(err as Error).message}`);
  }

  // An empty file loads as undefined.
  const r = schema.safeParse(parsed ?? {});
  if (!r.success) {
    throw new ConfigDocumentError(source, `Invalid value in ${source}: ${r.error.message}`);
  }
  return r.data;
}

export function parseSitesDocument(text: string, opts: { source?: string } = {}): SitesConfig {
  return parseDocument(sitesConfigSchema, text, opts);
}
