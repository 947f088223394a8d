import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../../providers/supabase/supabase.service';
import { Account, NewAccount } from '../../entities';
import { DatabaseError, RecordConflictError, UNIQUE_VIOLATION } from '../../database.errors';
import {
  AccountsRepository,
  ConsumeParams,
  ConsumeResult,
  SubscriptionUpdate,
} from '../accounts.repository';

@Injectable()
export class SupabaseAccountsRepository extends AccountsRepository {
  private readonly logger = new Logger(SupabaseAccountsRepository.name);

  constructor(private supabaseService: SupabaseService) {
    super();
  }

  async create(input: NewAccount): Promise<Account> {
    const now = new Date().toISOString();
    const { data, error } = await this.supabaseService
      .from('accounts')
      .insert({
        ...input,
        trial_documents_used: 0,
        documents_balance: 0,
        total_documents_purchased: 0,
        total_documents_used: 0,
        subscription_active: false,
        stripe_subscription_id: null,
        created_at: now,
        updated_at: now,
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new RecordConflictError('accounts', error.details);
      }
      this.logger.error(`Failed to create account: ${error.message}`);
      throw new DatabaseError('accounts.insert', error.message);
    }

    return data;
  }

  async findById(id: string): Promise<Account | null> {
    const { data, error } = await this.supabaseService
      .from('accounts')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new DatabaseError('accounts.select', error.message);
    }

    return data;
  }

  /**
   * consume_document 在数据库函数内加行锁后判断并扣减
   */
  async consumeDocument(accountId: string, params: ConsumeParams): Promise<ConsumeResult | null> {
    const { data, error } = await this.supabaseService.getClient().rpc('consume_document', {
      p_account_id: accountId,
      p_now: params.now.toISOString(),
      p_trial_document_limit: params.trialDocumentLimit,
    });

    if (error) {
      this.logger.error(`consume_document failed for ${accountId}: ${error.message}`);
      throw new DatabaseError('rpc.consume_document', error.message);
    }

    return data ?? null;
  }

  async updateSubscription(accountId: string, update: SubscriptionUpdate): Promise<Account | null> {
    const { data, error } = await this.supabaseService
      .from('accounts')
      .update({
        subscription_active: update.active,
        stripe_subscription_id: update.subscriptionId,
        updated_at: new Date().toISOString(),
      })
      .eq('id', accountId)
      .select()
      .maybeSingle();

    if (error) {
      throw new DatabaseError('accounts.update', error.message);
    }

    return data;
  }
}
