import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { NewUsageLog, UsageLog } from '../../entities';
import { UsageLogsRepository } from '../usage-logs.repository';
import { MemoryDatabase } from './memory-database';

@Injectable()
export class MemoryUsageLogsRepository extends UsageLogsRepository {
  constructor(private db: MemoryDatabase) {
    super();
  }

  async record(entry: NewUsageLog): Promise<UsageLog> {
    const log: UsageLog = { ...entry, id: uuidv4(), created_at: new Date().toISOString() };
    this.db.usageLogs.push(log);
    return { ...log };
  }
}
