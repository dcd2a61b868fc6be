import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadSettings } from '../config/settings.js';
import { CloudBrowserError, toError } from '../errors.js';
import {
  createCloudBrowserExtension,
  type RequestDispatchExtension,
} from '../extension/request-dispatch-extension.js';
import { booleanOptionSchema, formatJson, pathOptionSchema } from './options.js';

const fetchArgsSchema = z.object({
  config: pathOptionSchema('config'),
  urls: z
    .string({ required_error: 'Missing required option: --urls' })
    .transform((value) =>
      value
        .split(',')
        .map((url) => url.trim())
        .filter((url) => url.length > 0),
    )
    .pipe(
      z
        .array(z.string().url('Invalid --urls. Every entry must be an absolute URL.'))
        .min(1, 'Missing required option: --urls'),
    ),
  timeoutMs: z.coerce
    .number()
    .int()
    .positive('Invalid --timeoutMs. Must be a positive integer.')
    .optional(),
  outputFile: pathOptionSchema('outputFile'),
  pretty: booleanOptionSchema,
});

type FetchArgs = z.infer<typeof fetchArgsSchema>;

type FetchResult =
  | { url: string; ok: true; status: number; finalUrl: string; bytes: number }
  | { url: string; ok: false; error: string; retryable: boolean };

/**
 * Fetches every URL concurrently through the pool. One failure does not
 * stop the others; the exit code is 1 when any of them failed.
 */
async function fetchAll(
  extension: RequestDispatchExtension,
  urls: string[],
  timeoutMs?: number,
): Promise<FetchResult[]> {
  const settled = await Promise.allSettled(
    urls.map((url) => extension.fetch({ url }, { timeoutMs })),
  );

  return settled.map((outcome, index): FetchResult => {
    const url = urls[index] ?? '';
    if (outcome.status === 'fulfilled') {
      return {
        url,
        ok: true,
        status: outcome.value.status,
        finalUrl: outcome.value.url,
        bytes: outcome.value.body.length,
      };
    }

    const error = toError(outcome.reason);
    const retryable = error instanceof CloudBrowserError && error.retryable;
    return { url, ok: false, error: error.message, retryable };
  });
}

export async function runFetchAction(args: FetchArgs): Promise<number> {
  const startTime = Date.now();
  const settings = await loadSettings(args.config);
  const extension = createCloudBrowserExtension(settings);

  log.info('Starting fetch action', { urls: args.urls.length, slots: settings.NUM_BROWSERS });
  try {
    const report = await extension.onStart();
    if (report.ready === 0) {
      log.warn('No browser session could be provisioned during warm-up');
    }

    const results = await fetchAll(extension, args.urls, args.timeoutMs);
    const output = formatJson(results, args.pretty);

    if (args.outputFile) {
      await mkdir(dirname(args.outputFile), { recursive: true });
      await writeFile(args.outputFile, output, 'utf-8');
    } else {
      console.log(output);
    }

    log.info(`Execution finished in ${Date.now() - startTime}ms`, extension.pool.getStats());
    return results.every((result) => result.ok) ? 0 : 1;
  } finally {
    await extension.onStop();
  }
}

export { fetchArgsSchema, fetchAll };
export type { FetchArgs, FetchResult };
