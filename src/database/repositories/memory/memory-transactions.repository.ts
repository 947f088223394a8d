import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { NewTransaction, Transaction, TransactionStatus } from '../../entities';
import { RecordConflictError } from '../../database.errors';
import {
  CompletedPurchase,
  CompletePurchaseParams,
  ListTransactionsParams,
  TransactionsRepository,
} from '../transactions.repository';
import { MemoryDatabase } from './memory-database';

function compareNewestFirst(a: Transaction, b: Transaction): number {
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? 1 : -1;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

@Injectable()
export class MemoryTransactionsRepository extends TransactionsRepository {
  constructor(private db: MemoryDatabase) {
    super();
  }

  async create(input: NewTransaction): Promise<Transaction> {
    if (this.db.transactions.has(input.stripe_payment_intent_id)) {
      throw new RecordConflictError('transactions', input.stripe_payment_intent_id);
    }
    const transaction: Transaction = {
      ...input,
      id: uuidv4(),
      status: TransactionStatus.PENDING,
      stripe_charge_id: null,
      created_at: new Date().toISOString(),
      completed_at: null,
    };
    this.db.transactions.set(transaction.stripe_payment_intent_id, transaction);
    return { ...transaction };
  }

  async findByReference(paymentIntentId: string): Promise<Transaction | null> {
    const transaction = this.db.transactions.get(paymentIntentId);
    return transaction ? { ...transaction } : null;
  }

  async listByAccount(accountId: string, params: ListTransactionsParams): Promise<Transaction[]> {
    const { after } = params;
    return [...this.db.transactions.values()]
      .filter((tx) => tx.account_id === accountId)
      .filter(
        (tx) =>
          !after ||
          tx.created_at < after.created_at ||
          (tx.created_at === after.created_at && tx.id < after.id),
      )
      .sort(compareNewestFirst)
      .slice(0, params.limit)
      .map((tx) => ({ ...tx }));
  }

  async completePurchase(
    paymentIntentId: string,
    params: CompletePurchaseParams,
  ): Promise<CompletedPurchase | null> {
    const transaction = this.db.transactions.get(paymentIntentId);
    if (!transaction || transaction.status !== TransactionStatus.PENDING) {
      return null;
    }
    const account = this.db.accounts.get(transaction.account_id);
    if (!account) {
      return null;
    }

    transaction.status = TransactionStatus.SUCCEEDED;
    transaction.stripe_charge_id = params.chargeId;
    transaction.completed_at = params.completedAt.toISOString();
    account.documents_balance += transaction.documents_count;
    account.total_documents_purchased += transaction.documents_count;
    account.updated_at = params.completedAt.toISOString();

    return { transaction: { ...transaction }, account: { ...account } };
  }

  async failPurchase(paymentIntentId: string, completedAt: Date): Promise<Transaction | null> {
    const transaction = this.db.transactions.get(paymentIntentId);
    if (!transaction || transaction.status !== TransactionStatus.PENDING) {
      return null;
    }
    transaction.status = TransactionStatus.FAILED;
    transaction.completed_at = completedAt.toISOString();
    return { ...transaction };
  }
}
