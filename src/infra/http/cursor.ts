import { z } from 'zod';
import type { Cursor } from '../../application/users/userRepository.js';

export class InvalidCursorError extends Error {
  constructor(message = 'Invalid cursor') {
    super(message);
    this.name = 'InvalidCursorError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const cursorSchema = z.object({
  afterId: z.string().uuid(),
});

/**
 * Cursors travel as base64url-encoded JSON so clients treat them as opaque.
 */
export function encodeCursor(cursor: Cursor): string {
  return Buffer.from(JSON.stringify({ afterId: cursor.afterId }), 'utf8').toString('base64url');
}

export function decodeCursor(raw: string): Cursor {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(raw, 'base64url').toString('utf8'));
  } catch {
    throw new InvalidCursorError();
  }

  const parsed = cursorSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidCursorError();
  }
  return { afterId: parsed.data.afterId };
}
