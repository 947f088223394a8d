import { Account, NewTransaction, Transaction } from '../entities';

export interface TransactionCursor {
  created_at: string;
  id: string;
}

export interface ListTransactionsParams {
  limit: number;
  after?: TransactionCursor;
}

export interface CompletePurchaseParams {
  chargeId: string | null;
  completedAt: Date;
}

export interface CompletedPurchase {
  transaction: Transaction;
  account: Account;
}

/**
 * 交易流水存储，只追加；状态只能从 pending 变更一次
 */
export abstract class TransactionsRepository {
  abstract create(input: NewTransaction): Promise<Transaction>;

  abstract findByReference(paymentIntentId: string): Promise<Transaction | null>;

  /** 按 created_at、id 倒序 */
  abstract listByAccount(accountId: string, params: ListTransactionsParams): Promise<Transaction[]>;

  /**
   * pending -> succeeded 并给账户加余额，同一事务
   * 交易不存在或已不是 pending 时返回 null
   */
  abstract completePurchase(
    paymentIntentId: string,
    params: CompletePurchaseParams,
  ): Promise<CompletedPurchase | null>;

  /** pending -> failed，已不是 pending 时返回 null */
  abstract failPurchase(paymentIntentId: string, completedAt: Date): Promise<Transaction | null>;
}
