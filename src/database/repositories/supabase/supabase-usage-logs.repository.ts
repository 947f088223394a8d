import { Injectable } from '@nestjs/common';
import { SupabaseService } from '../../../providers/supabase/supabase.service';
import { NewUsageLog, UsageLog } from '../../entities';
import { DatabaseError } from '../../database.errors';
import { UsageLogsRepository } from '../usage-logs.repository';

@Injectable()
export class SupabaseUsageLogsRepository extends UsageLogsRepository {
  constructor(private supabaseService: SupabaseService) {
    super();
  }

  async record(entry: NewUsageLog): Promise<UsageLog> {
    const { data, error } = await this.supabaseService
      .from('usage_logs')
      .insert({ ...entry, created_at: new Date().toISOString() })
      .select()
      .single();

    if (error) {
      throw new DatabaseError('usage_logs.insert', error.message);
    }

    return data;
  }
}
