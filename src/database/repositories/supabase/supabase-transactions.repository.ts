import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../../providers/supabase/supabase.service';
import { NewTransaction, Transaction, TransactionStatus } from '../../entities';
import { DatabaseError, RecordConflictError, UNIQUE_VIOLATION } from '../../database.errors';
import {
  CompletedPurchase,
  CompletePurchaseParams,
  ListTransactionsParams,
  TransactionsRepository,
} from '../transactions.repository';

@Injectable()
export class SupabaseTransactionsRepository extends TransactionsRepository {
  private readonly logger = new Logger(SupabaseTransactionsRepository.name);

  constructor(private supabaseService: SupabaseService) {
    super();
  }

  async create(input: NewTransaction): Promise<Transaction> {
    const { data, error } = await this.supabaseService
      .from('transactions')
      .insert({
        ...input,
        status: TransactionStatus.PENDING,
        stripe_charge_id: null,
        completed_at: null,
        created_at: new Date().toISOString(),
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new RecordConflictError('transactions', error.details);
      }
      this.logger.error(`Failed to create transaction: ${error.message}`);
      throw new DatabaseError('transactions.insert', error.message);
    }

    return data;
  }

  async findByReference(paymentIntentId: string): Promise<Transaction | null> {
    const { data, error } = await this.supabaseService
      .from('transactions')
      .select('*')
      .eq('stripe_payment_intent_id', paymentIntentId)
      .maybeSingle();

    if (error) {
      throw new DatabaseError('transactions.select', error.message);
    }

    return data;
  }

  async listByAccount(accountId: string, params: ListTransactionsParams): Promise<Transaction[]> {
    let query = this.supabaseService
      .from('transactions')
      .select('*')
      .eq('account_id', accountId)
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(params.limit);

    // 游标分页（created_at 相同时按 id 继续）
    if (params.after) {
      const { created_at: createdAt, id } = params.after;
      query = query.or(
        `created_at.lt."${createdAt}",and(created_at.eq."${createdAt}",id.lt.${id})`,
      );
    }

    const { data, error } = await query;

    if (error) {
      this.logger.error(`Failed to fetch transactions: ${error.message}`);
      throw new DatabaseError('transactions.list', error.message);
    }

    return data ?? [];
  }

  /**
   * confirm_purchase 在一个事务内完成状态迁移和加余额
   */
  async completePurchase(
    paymentIntentId: string,
    params: CompletePurchaseParams,
  ): Promise<CompletedPurchase | null> {
    const { data, error } = await this.supabaseService.getClient().rpc('confirm_purchase', {
      p_payment_intent_id: paymentIntentId,
      p_charge_id: params.chargeId,
      p_completed_at: params.completedAt.toISOString(),
    });

    if (error) {
      this.logger.error(`confirm_purchase failed for ${paymentIntentId}: ${error.message}`);
      throw new DatabaseError('rpc.confirm_purchase', error.message);
    }

    return data ?? null;
  }

  async failPurchase(paymentIntentId: string, completedAt: Date): Promise<Transaction | null> {
    const { data, error } = await this.supabaseService
      .from('transactions')
      .update({
        status: TransactionStatus.FAILED,
        completed_at: completedAt.toISOString(),
      })
      .eq('stripe_payment_intent_id', paymentIntentId)
      .eq('status', TransactionStatus.PENDING) // 状态守卫
      .select()
      .maybeSingle();

    if (error) {
      throw new DatabaseError('transactions.update', error.message);
    }

    return data;
  }
}
