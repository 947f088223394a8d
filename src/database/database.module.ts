import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { AccountsRepository, TransactionsRepository, UsageLogsRepository } from './repositories';
import { SupabaseAccountsRepository } from './repositories/supabase/supabase-accounts.repository';
import { SupabaseTransactionsRepository } from './repositories/supabase/supabase-transactions.repository';
import { SupabaseUsageLogsRepository } from './repositories/supabase/supabase-usage-logs.repository';
import { MemoryDatabase } from './repositories/memory/memory-database';
import { MemoryAccountsRepository } from './repositories/memory/memory-accounts.repository';
import { MemoryTransactionsRepository } from './repositories/memory/memory-transactions.repository';
import { MemoryUsageLogsRepository } from './repositories/memory/memory-usage-logs.repository';

export type DatabaseDriver = 'supabase' | 'memory';

export function resolveDatabaseDriver(value: string | undefined): DatabaseDriver {
  if (value === undefined || value === '' || value === 'supabase') {
    return 'supabase';
  }
  if (value === 'memory') {
    return 'memory';
  }
  throw new Error(`Unsupported DATABASE_DRIVER "${value}"`);
}

@Global()
@Module({})
export class DatabaseModule {
  static forRoot(driver: DatabaseDriver): DynamicModule {
    const providers: Provider[] =
      driver === 'memory'
        ? [
            MemoryDatabase,
            { provide: AccountsRepository, useClass: MemoryAccountsRepository },
            { provide: TransactionsRepository, useClass: MemoryTransactionsRepository },
            { provide: UsageLogsRepository, useClass: MemoryUsageLogsRepository },
          ]
        : [
            { provide: AccountsRepository, useClass: SupabaseAccountsRepository },
            { provide: TransactionsRepository, useClass: SupabaseTransactionsRepository },
            { provide: UsageLogsRepository, useClass: SupabaseUsageLogsRepository },
          ];

    return {
      module: DatabaseModule,
      providers,
      exports: [
        AccountsRepository,
        TransactionsRepository,
        UsageLogsRepository,
        ...(driver === 'memory' ? [MemoryDatabase] : []),
      ],
    };
  }
}
