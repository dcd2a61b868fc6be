import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadSettings, redactSettings, toPoolConfig } from '../config/settings.js';
import { ConfigError } from '../errors.js';
import { booleanOptionSchema, formatJson, pathOptionSchema } from './options.js';

const checkConfigArgsSchema = z.object({
  config: pathOptionSchema('config'),
  pretty: booleanOptionSchema,
});

type CheckConfigArgs = z.infer<typeof checkConfigArgsSchema>;

/**
 * Validates the settings and prints them, token redacted, with the
 * resulting pool size.
 */
export async function runCheckConfigAction(args: CheckConfigArgs): Promise<number> {
  try {
    const settings = await loadSettings(args.config);
    const config = toPoolConfig(settings);

    console.log(
      formatJson(
        {
          valid: true,
          source: args.config ?? 'environment',
          settings: redactSettings(settings),
          slots: config.numBrowsers,
        },
        args.pretty,
      ),
    );
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(formatJson({ valid: false, issues: error.issues }, args.pretty));
      return 1;
    }

    log.error('Configuration check failed', error);
    return 1;
  }
}

export { checkConfigArgsSchema };
export type { CheckConfigArgs };
