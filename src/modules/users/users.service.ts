import { Injectable } from '@nestjs/common';
import { QuotaService } from '../quota/quota.service';

export interface AccountStatusDto {
  can_process: boolean;
  is_trial: boolean;
  trial_ends_at: string;
  documents_remaining: number;
  trial_documents_remaining: number;
  subscription_active: boolean;
}

export interface AccountProfileDto {
  id: string;
  email: string;
  created_at: string;
  trial_started_at: string;
  trial_ends_at: string;
  documents_balance: number;
  total_documents_purchased: number;
  total_documents_used: number;
  subscription_active: boolean;
}

@Injectable()
export class UsersService {
  constructor(private quotaService: QuotaService) {}

  async getProfile(accountId: string): Promise<AccountProfileDto> {
    const account = await this.quotaService.getAccount(accountId);
    return {
      id: account.id,
      email: account.email,
      created_at: account.created_at,
      trial_started_at: account.trial_started_at,
      trial_ends_at: account.trial_ends_at,
      documents_balance: account.documents_balance,
      total_documents_purchased: account.total_documents_purchased,
      total_documents_used: account.total_documents_used,
      subscription_active: account.subscription_active,
    };
  }

  /**
   * 桌面端处理前的快速状态检查（只读）
   */
  async getStatus(accountId: string): Promise<AccountStatusDto> {
    const account = await this.quotaService.getAccount(accountId);
    const decision = this.quotaService.evaluate(account);
    return {
      can_process: decision.allowed,
      is_trial: decision.is_trial,
      trial_ends_at: account.trial_ends_at,
      documents_remaining: decision.documents_remaining,
      trial_documents_remaining: decision.trial_documents_remaining,
      subscription_active: account.subscription_active,
    };
  }
}
