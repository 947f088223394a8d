import { Inject, Injectable, Logger } from '@nestjs/common';
import { UsageLogsRepository } from '../../database/repositories';
import { NewUsageLog, UsageOutcome } from '../../database/entities';
import { BILLING_CONFIG, BillingConfig } from '../../common/config/billing.config';
import { QuotaExceededException } from '../../common/exceptions/domain.exceptions';
import { QuotaService } from '../quota/quota.service';
import { ProcessDocumentDto, ProcessDocumentResponseDto } from './dto/process-document.dto';

const SOURCE_OUTCOME = {
  trial: UsageOutcome.TRIAL,
  balance: UsageOutcome.BALANCE,
  subscription: UsageOutcome.SUBSCRIPTION,
} as const;

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    private quotaService: QuotaService,
    private usageLogsRepository: UsageLogsRepository,
    @Inject(BILLING_CONFIG) private billingConfig: BillingConfig,
  ) {}

  /**
   * 桌面端开始摘要前调用，扣减一篇额度
   */
  async process(accountId: string, dto: ProcessDocumentDto): Promise<ProcessDocumentResponseDto> {
    const outcome = await this.quotaService.consume(accountId).catch(async (err: unknown) => {
      if (err instanceof QuotaExceededException && this.billingConfig.usageLogMode === 'all') {
        await this.recordUsage({
          account_id: accountId,
          document_name: dto.document_name ?? null,
          case_id: dto.case_id ?? null,
          outcome: UsageOutcome.REJECTED,
        });
      }
      throw err;
    });

    if (this.billingConfig.usageLogMode !== 'off') {
      await this.recordUsage({
        account_id: accountId,
        document_name: dto.document_name ?? null,
        case_id: dto.case_id ?? null,
        outcome: SOURCE_OUTCOME[outcome.source],
      });
    }

    return {
      success: true,
      remaining_balance: outcome.remaining_balance,
      was_trial: outcome.source === 'trial',
      source: outcome.source,
      message: 'Document processing authorized',
    };
  }

  /**
   * 使用记录仅用于统计，写入失败不影响已完成的扣减
   */
  private async recordUsage(entry: NewUsageLog): Promise<void> {
    try {
      await this.usageLogsRepository.record(entry);
    } catch (err) {
      this.logger.error(
        `Failed to record usage for account ${entry.account_id}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
