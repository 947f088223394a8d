import { Account, NewAccount } from '../entities';

export type ConsumeSource = 'subscription' | 'trial' | 'balance';

/**
 * consume 的结果，source 为 null 表示额度不足，账户未被修改
 */
export interface ConsumeResult {
  source: ConsumeSource | null;
  account: Account;
}

export interface ConsumeParams {
  now: Date;
  trialDocumentLimit: number;
}

export interface SubscriptionUpdate {
  active: boolean;
  subscriptionId: string | null;
}

/**
 * 账户存储
 * consumeDocument 必须在单个事务内完成判断和扣减
 */
export abstract class AccountsRepository {
  /** email 重复时抛出 RecordConflictError */
  abstract create(input: NewAccount): Promise<Account>;

  abstract findById(id: string): Promise<Account | null>;

  /** 账户不存在时返回 null */
  abstract consumeDocument(accountId: string, params: ConsumeParams): Promise<ConsumeResult | null>;

  abstract updateSubscription(accountId: string, update: SubscriptionUpdate): Promise<Account | null>;
}
