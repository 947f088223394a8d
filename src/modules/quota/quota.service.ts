import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { AccountsRepository, ConsumeSource } from '../../database/repositories';
import { Account } from '../../database/entities';
import { BILLING_CONFIG, BillingConfig } from '../../common/config/billing.config';
import { QuotaExceededException } from '../../common/exceptions/domain.exceptions';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { evaluateQuota, QuotaDecision } from './quota.policy';

export interface ConsumeOutcome {
  source: ConsumeSource;
  remaining_balance: number;
  account: Account;
}

/**
 * 额度引擎：判断能否处理文档，并原子扣减
 */
@Injectable()
export class QuotaService {
  private readonly logger = new Logger(QuotaService.name);

  constructor(
    private accountsRepository: AccountsRepository,
    @Inject(BILLING_CONFIG) private billingConfig: BillingConfig,
  ) {}

  async getAccount(accountId: string): Promise<Account> {
    const account = await this.accountsRepository.findById(accountId);
    if (!account) {
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: 'Account not found',
      });
    }
    return account;
  }

  evaluate(account: Account, now: Date = new Date()): QuotaDecision {
    return evaluateQuota(account, now, this.billingConfig.trialDocumentLimit);
  }

  async canProcess(accountId: string): Promise<QuotaDecision> {
    const account = await this.getAccount(accountId);
    return this.evaluate(account);
  }

  /**
   * 消耗一篇文档额度
   * 判断与扣减在存储层同一事务内完成，不复用之前的 canProcess 结果
   */
  async consume(accountId: string): Promise<ConsumeOutcome> {
    const result = await this.accountsRepository.consumeDocument(accountId, {
      now: new Date(),
      trialDocumentLimit: this.billingConfig.trialDocumentLimit,
    });

    if (!result) {
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: 'Account not found',
      });
    }

    if (!result.source) {
      this.logger.log(`Quota exceeded for account ${accountId}`);
      throw new QuotaExceededException();
    }

    if (result.source === 'balance') {
      this.logger.log(
        `Deducted 1 document from account ${accountId}, new balance: ${result.account.documents_balance}`,
      );
    }

    return {
      source: result.source,
      remaining_balance: result.account.documents_balance,
      account: result.account,
    };
  }
}
