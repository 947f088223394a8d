import { Injectable } from '@nestjs/common';
import { Account, Transaction, UsageLog } from '../../entities';

/**
 * 进程内存储（DATABASE_DRIVER=memory，本地开发与测试）
 * 每个仓储方法的读-判断-写之间没有 await，等价于单行事务
 */
@Injectable()
export class MemoryDatabase {
  readonly accounts = new Map<string, Account>();
  readonly transactions = new Map<string, Transaction>(); // key: stripe_payment_intent_id
  readonly usageLogs: UsageLog[] = [];

  clear(): void {
    this.accounts.clear();
    this.transactions.clear();
    this.usageLogs.length = 0;
  }
}
