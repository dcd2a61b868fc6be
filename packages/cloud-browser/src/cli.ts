#!/usr/bin/env node
import { z } from 'zod';
import { checkConfigArgsSchema, runCheckConfigAction } from './actions/check-config.js';
import { fetchArgsSchema, runFetchAction } from './actions/fetch.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('check-config'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('fetch'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const separator = arg.indexOf('=');
    const key = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (!key) {
      continue;
    }

    if (separator !== -1) {
      options[key] = arg.slice(separator + 1);
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`cloud-browser CLI

Usage:
  cli help
  cli check-config
  cli check-config --config=./cloud-browser.json --pretty
  cli fetch --config=./cloud-browser.json --urls=https://example.com
  cli fetch --urls=https://example.com,https://example.org --timeoutMs=30000
  cli fetch --config=./cloud-browser.json --urls=https://example.com --outputFile=./tmp/fetch.json

Commands:
  help          Show this help message
  check-config  Validate CLOUD_BROWSER settings and print them with the token redacted
  fetch         Warm up the browser pool, fetch the given URLs through it, then shut it down

Settings:
  --config takes a JSON file holding a CLOUD_BROWSER object (or the object itself).
  Without --config, CLOUD_BROWSER_<KEY> environment variables are read instead,
  e.g. CLOUD_BROWSER_API_HOST, CLOUD_BROWSER_API_TOKEN, CLOUD_BROWSER_PROXIES=a,b.

Fetch options:
  --urls       Required. Comma-separated absolute URLs.
  --timeoutMs  Optional. Longest wait for a free browser session per URL.
  --outputFile Optional. Writes JSON results to the given file path.
  --pretty     Optional. Pretty-print JSON output.
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  const { command: action, options: actionOptions } = parsedCliInput.data;
  if (action === 'check-config') {
    const checkArgs = parseActionArgs(checkConfigArgsSchema, actionOptions);
    return checkArgs ? runCheckConfigAction(checkArgs) : 1;
  }

  const fetchArgs = parseActionArgs(fetchArgsSchema, actionOptions);
  return fetchArgs ? runFetchAction(fetchArgs) : 1;
}

/**
 * Validates an action's options, printing the first issue and the help
 * text when they do not fit.
 */
function parseActionArgs<Args>(
  schema: z.ZodType<Args, z.ZodTypeDef, unknown>,
  options: Record<string, string>,
): Args | undefined {
  const parsed = schema.safeParse(options);
  if (parsed.success) {
    return parsed.data;
  }

  console.error(parsed.error.issues[0]?.message ?? 'Invalid arguments');
  printHelp();
  return undefined;
}

const exitCode = await main();
process.exitCode = exitCode;
