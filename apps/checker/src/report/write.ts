import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { AppError, errorMessage } from '../errors';
import type { ReportPayload } from './summary';

export async function writeJsonReport(path: string, payload: ReportPayload): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  } catch (err) {
    throw new AppError('REPORT_WRITE_FAILED', `Cannot write report to ${path}: ${errorMessage(err)}`);
  }
}
