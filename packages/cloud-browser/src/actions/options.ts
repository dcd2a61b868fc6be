import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const booleanOptionSchema = z
  .preprocess((value) => {
    if (value === undefined) {
      return 'false';
    }

    if (typeof value === 'string') {
      return value.toLowerCase();
    }

    return value;
  }, booleanFromCliSchema)
  .default(false);

const pathOptionSchema = (option: string) =>
  z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, `Invalid --${option} path`),
    )
    .optional();

function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

export { booleanOptionSchema, pathOptionSchema, formatJson };
