import { readFile } from 'node:fs/promises';

import {
  ConfigDocumentError,
  normalizeSitesConfig,
  parseSitesDocument,
  type NormalizedSitesConfig,
} from '@pulsecheck/config';

import { AppError, errorMessage } from './errors';

function isNotFound(err: unknown): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === 'ENOENT';
}

export async function loadSitesConfig(path: string): Promise<NormalizedSitesConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new AppError('CONFIG_NOT_FOUND', `Config file not found: ${path}`);
    }
    throw new AppError('INVALID_CONFIG', `Cannot read config ${path}: ${errorMessage(err)}`);
  }

  try {
    return normalizeSitesConfig(parseSitesDocument(text, { source: path }));
  } catch (err) {
    if (err instanceof ConfigDocumentError) {
      throw new AppError('INVALID_CONFIG', err.message);
    }
    throw err;
  }
}
