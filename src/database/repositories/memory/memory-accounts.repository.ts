import { Injectable } from '@nestjs/common';
import { Account, NewAccount } from '../../entities';
import { RecordConflictError } from '../../database.errors';
import {
  AccountsRepository,
  ConsumeParams,
  ConsumeResult,
  ConsumeSource,
  SubscriptionUpdate,
} from '../accounts.repository';
import { MemoryDatabase } from './memory-database';

@Injectable()
export class MemoryAccountsRepository extends AccountsRepository {
  constructor(private db: MemoryDatabase) {
    super();
  }

  async create(input: NewAccount): Promise<Account> {
    const email = input.email.toLowerCase();
    for (const existing of this.db.accounts.values()) {
      if (existing.email.toLowerCase() === email) {
        throw new RecordConflictError('accounts', `email=${input.email}`);
      }
    }
    if (this.db.accounts.has(input.id)) {
      throw new RecordConflictError('accounts', `id=${input.id}`);
    }

    const now = new Date().toISOString();
    const account: Account = {
      ...input,
      trial_documents_used: 0,
      documents_balance: 0,
      total_documents_purchased: 0,
      total_documents_used: 0,
      subscription_active: false,
      stripe_subscription_id: null,
      created_at: now,
      updated_at: now,
    };
    this.db.accounts.set(account.id, account);
    return { ...account };
  }

  async findById(id: string): Promise<Account | null> {
    const account = this.db.accounts.get(id);
    return account ? { ...account } : null;
  }

  async consumeDocument(accountId: string, params: ConsumeParams): Promise<ConsumeResult | null> {
    const account = this.db.accounts.get(accountId);
    if (!account) {
      return null;
    }

    let source: ConsumeSource | null = null;
    if (account.subscription_active) {
      source = 'subscription';
    } else if (
      params.now.getTime() < new Date(account.trial_ends_at).getTime() &&
      account.trial_documents_used < params.trialDocumentLimit
    ) {
      source = 'trial';
      account.trial_documents_used += 1;
    } else if (account.documents_balance > 0) {
      source = 'balance';
      account.documents_balance -= 1;
    }

    if (source) {
      account.total_documents_used += 1;
      account.updated_at = params.now.toISOString();
    }

    return { source, account: { ...account } };
  }

  async updateSubscription(accountId: string, update: SubscriptionUpdate): Promise<Account | null> {
    const account = this.db.accounts.get(accountId);
    if (!account) {
      return null;
    }
    account.subscription_active = update.active;
    account.stripe_subscription_id = update.subscriptionId;
    account.updated_at = new Date().toISOString();
    return { ...account };
  }
}
