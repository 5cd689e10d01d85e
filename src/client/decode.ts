import type { z } from 'zod';

import { ProtocolError } from '../errors/index.js';

/** Validate a command's raw `value` against the shape that command returns. */
export function decodeValue<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  command: string,
): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ProtocolError(
      `unexpected ${command} response${where}: ${issue?.message ?? 'invalid value'}`,
    );
  }
  return parsed.data;
}
