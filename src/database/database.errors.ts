/**
 * 唯一约束冲突（Postgres 23505）
 */
export class RecordConflictError extends Error {
  constructor(
    readonly table: string,
    readonly detail?: string,
  ) {
    super(`Unique constraint violated on ${table}${detail ? `: ${detail}` : ''}`);
    this.name = 'RecordConflictError';
  }
}

/**
 * 数据库请求失败
 */
export class DatabaseError extends Error {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'DatabaseError';
  }
}

export const UNIQUE_VIOLATION = '23505';
