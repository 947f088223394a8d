import { NewUsageLog, UsageLog } from '../entities';

export abstract class UsageLogsRepository {
  abstract record(entry: NewUsageLog): Promise<UsageLog>;
}
