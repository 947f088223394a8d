import { TransactionCursor } from '../../database/repositories';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const TIMESTAMP_PATTERN = /^[0-9T:.+\-Z]+$/;

export function encodeCursor(cursor: TransactionCursor): string {
  return Buffer.from(JSON.stringify([cursor.created_at, cursor.id])).toString('base64url');
}

/**
 * 无法解析时返回 null
 */
export function decodeCursor(value: string): TransactionCursor | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(value, 'base64url').toString('utf8'));
  } catch {
    return null;
  }

  if (
    !Array.isArray(parsed) ||
    parsed.length !== 2 ||
    typeof parsed[0] !== 'string' ||
    typeof parsed[1] !== 'string' ||
    !TIMESTAMP_PATTERN.test(parsed[0]) ||
    Number.isNaN(Date.parse(parsed[0])) ||
    !UUID_PATTERN.test(parsed[1])
  ) {
    return null;
  }

  return { created_at: parsed[0], id: parsed[1] };
}
