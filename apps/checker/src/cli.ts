import { parseArgs } from 'node:util';

import { loadSitesConfig } from './config';
import { MAX_CONCURRENCY, readEnv, type Env } from './env';
import { AppError, EXIT_CHECKS_FAILED, EXIT_OK, errorMessage, handleError } from './errors';
import { runBatch } from './monitor/batch';
import { sendSlackNotification } from './notify/slack';
import {
  formatNotificationText,
  formatRunTimestamp,
  formatSummaryText,
  isValidTimeZone,
  toReportPayload,
} from './report/summary';
import { writeJsonReport } from './report/write';

export const DEFAULT_CONFIG_PATH = 'monitor/sites.yml';

export const USAGE = `Usage: pulsecheck [options]

Options:
  -c, --config <path>       sites document (default: ${DEFAULT_CONFIG_PATH})
  -j, --concurrency <n>     checks running at once (default: 10)
      --json <path>         also write a JSON report to <path>
      --timezone <zone>     IANA time zone for timestamps (default: local)
  -h, --help                show this help

Environment:
  SLACK_WEBHOOK_URL         post the summary to this Slack webhook
  PULSECHECK_CONCURRENCY    default for --concurrency`;

export type CliOptions = {
  configPath: string;
  concurrency: number;
  jsonPath: string | null;
  timeZone: string;
  help: boolean;
};

function parseConcurrency(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new AppError('INVALID_ARGUMENT', `--concurrency must be an integer, got "${raw}"`);
  }
  return Math.min(Math.max(1, Number.parseInt(trimmed, 10)), MAX_CONCURRENCY);
}

function readArgValues(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        concurrency: { type: 'string', short: 'j' },
        json: { type: 'string' },
        timezone: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new AppError('INVALID_ARGUMENT', errorMessage(err));
  }
}

export function parseCliArgs(argv: string[], env: Env): CliOptions {
  const values = readArgValues(argv);

  const timeZone = values.timezone ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
  if (!isValidTimeZone(timeZone)) {
    throw new AppError('INVALID_ARGUMENT', `Unknown time zone: ${timeZone}`);
  }

  return {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    concurrency: parseConcurrency(values.concurrency, env.concurrency),
    jsonPath: values.json ?? null,
    timeZone,
    help: values.help ?? false,
  };
}

async function deliverNotification(webhookUrl: string, text: string): Promise<void> {
  const outcome = await sendSlackNotification(webhookUrl, text);
  if (outcome.status === 'failed') {
    console.warn(`notify: slack delivery failed: ${outcome.error ?? 'unknown error'}`);
  }
}

export async function runCli(
  argv: string[],
  envSource: Record<string, string | undefined> = process.env,
): Promise<number> {
  try {
    const env = readEnv(envSource);
    const options = parseCliArgs(argv, env);
    if (options.help) {
      console.log(USAGE);
      return EXIT_OK;
    }

    const { targets, defaults, okRanges } = await loadSitesConfig(options.configPath);
    const run = await runBatch(targets, { defaults, okRanges, concurrency: options.concurrency });

    const timestamp = formatRunTimestamp(new Date(), options.timeZone);
    const summaryText = formatSummaryText(run, timestamp);
    console.log(summaryText);

    if (options.jsonPath) {
      await writeJsonReport(options.jsonPath, toReportPayload(run, timestamp));
    }

    // Decided before notifying; delivery cannot change it.
    const exitCode = run.passed ? EXIT_OK : EXIT_CHECKS_FAILED;

    if (env.slackWebhookUrl) {
      await deliverNotification(env.slackWebhookUrl, formatNotificationText(run, summaryText));
    }

    return exitCode;
  } catch (err) {
    return handleError(err);
  }
}
