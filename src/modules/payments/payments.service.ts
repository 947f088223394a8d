import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import {
  AccountsRepository,
  TransactionCursor,
  TransactionsRepository,
} from '../../database/repositories';
import { Transaction, TransactionStatus } from '../../database/entities';
import { BILLING_CONFIG, BillingConfig } from '../../common/config/billing.config';
import {
  AlreadyProcessedException,
  PaymentNotCompletedException,
  UnknownTransactionException,
} from '../../common/exceptions/domain.exceptions';
import { ErrorCode, PaginatedResponse } from '../../common/interfaces/response.interface';
import { PaymentIntentSummary, StripeService } from '../../providers/stripe/stripe.service';
import {
  ConfirmPaymentDto,
  ConfirmPaymentResponseDto,
  CreateIntentDto,
  CreateIntentResponseDto,
  GetTransactionsQueryDto,
  TransactionResponseDto,
} from './dto/payment.dto';
import { decodeCursor, encodeCursor } from './transaction-cursor';

/**
 * 购买流程：创建 PaymentIntent -> 确认后加余额
 * 状态机 pending -> succeeded | failed，由存储层的状态守卫保证只迁移一次
 */
@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(
    private stripeService: StripeService,
    private transactionsRepository: TransactionsRepository,
    private accountsRepository: AccountsRepository,
    @Inject(BILLING_CONFIG) private billingConfig: BillingConfig,
  ) {}

  /**
   * 创建待支付订单
   * 价格在此时写入交易记录，之后价格表变化不影响进行中的购买
   */
  async createIntent(accountId: string, dto: CreateIntentDto): Promise<CreateIntentResponseDto> {
    const pkg = this.billingConfig.packages[dto.package_type];
    if (!pkg) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: 'Invalid package type',
      });
    }

    const intent = await this.stripeService.createPaymentIntent({
      amount: pkg.amount,
      currency: this.billingConfig.currency,
      metadata: {
        account_id: accountId,
        package_type: pkg.type,
        documents_count: String(pkg.documents),
      },
    });

    if (!intent.client_secret) {
      throw new Error(`PaymentIntent ${intent.id} has no client secret`);
    }

    await this.transactionsRepository.create({
      account_id: accountId,
      stripe_payment_intent_id: intent.id,
      package_type: pkg.type,
      documents_count: pkg.documents,
      amount: pkg.amount,
      currency: this.billingConfig.currency,
    });

    this.logger.log(`PaymentIntent ${intent.id} created for account ${accountId} (${pkg.type})`);

    return {
      payment_intent_id: intent.id,
      client_secret: intent.client_secret,
      amount: pkg.amount,
      currency: this.billingConfig.currency,
      documents_count: pkg.documents,
    };
  }

  /**
   * 客户端支付完成后确认，可重复调用
   */
  async confirm(accountId: string, dto: ConfirmPaymentDto): Promise<ConfirmPaymentResponseDto> {
    const reference = dto.payment_intent_id;
    const transaction = await this.transactionsRepository.findByReference(reference);

    // 不属于当前账户的交易按不存在处理
    if (!transaction || transaction.account_id !== accountId) {
      throw new UnknownTransactionException();
    }
    if (transaction.status !== TransactionStatus.PENDING) {
      throw new AlreadyProcessedException(transaction.status);
    }

    let intent = await this.stripeService.retrievePaymentIntent(reference);

    if (intent.status !== 'succeeded' && intent.status !== 'processing') {
      // 未完成的 PaymentIntent 先在 Stripe 侧取消，client_secret 随之失效
      const processorStatus = intent.status;
      intent = await this.stripeService.cancelPaymentIntent(reference);

      if (intent.status === 'canceled') {
        const failed = await this.transactionsRepository.failPurchase(reference, new Date());
        if (!failed) {
          throw await this.alreadyProcessed(reference);
        }
        this.logger.log(
          `Transaction ${transaction.id} failed (processor status: ${processorStatus})`,
        );
        throw new PaymentNotCompletedException(processorStatus);
      }

      // 取消前客户已完成支付，按最新状态继续
      this.logger.warn(`PaymentIntent ${reference} could not be canceled, now ${intent.status}`);
    }

    if (intent.status === 'processing') {
      const account = await this.accountsRepository.findById(accountId);
      return {
        status: 'processing',
        documents_added: 0,
        new_balance: account?.documents_balance ?? 0,
      };
    }

    if (intent.status !== 'succeeded') {
      throw new PaymentNotCompletedException(intent.status);
    }

    const completed = await this.transactionsRepository.completePurchase(reference, {
      chargeId: intent.latest_charge,
      completedAt: new Date(),
    });
    if (!completed) {
      throw await this.alreadyProcessed(reference);
    }

    this.logger.log(
      `Added ${completed.transaction.documents_count} documents to account ${accountId}, new balance: ${completed.account.documents_balance}`,
    );

    return {
      status: 'succeeded',
      documents_added: completed.transaction.documents_count,
      new_balance: completed.account.documents_balance,
    };
  }

  /**
   * payment_intent.succeeded 回调，与 confirm 共用状态守卫
   * 返回是否实际加了余额
   */
  async applySucceededIntent(intent: PaymentIntentSummary): Promise<boolean> {
    const completed = await this.transactionsRepository.completePurchase(intent.id, {
      chargeId: intent.latest_charge,
      completedAt: new Date(),
    });

    if (!completed) {
      const current = await this.transactionsRepository.findByReference(intent.id);
      if (current?.status === TransactionStatus.FAILED) {
        // 本地已记为失败而 Stripe 已扣款，需要人工处理
        this.logger.error(
          `PaymentIntent ${intent.id} succeeded but transaction ${current.id} is marked failed`,
        );
      } else {
        this.logger.log(`PaymentIntent ${intent.id} unknown or already processed, skipping`);
      }
      return false;
    }

    this.logger.log(
      `Added ${completed.transaction.documents_count} documents to account ${completed.account.id} via webhook`,
    );
    return true;
  }

  /**
   * payment_intent.payment_failed / canceled 回调
   */
  async applyFailedIntent(intent: PaymentIntentSummary): Promise<boolean> {
    const failed = await this.transactionsRepository.failPurchase(intent.id, new Date());
    if (!failed) {
      this.logger.log(`PaymentIntent ${intent.id} unknown or already processed, skipping`);
      return false;
    }
    this.logger.log(`Transaction ${failed.id} marked failed (processor status: ${intent.status})`);
    return true;
  }

  /**
   * 交易记录（倒序，游标分页）
   */
  async listTransactions(
    accountId: string,
    query: GetTransactionsQueryDto,
  ): Promise<PaginatedResponse<TransactionResponseDto>> {
    const limit = query.limit || 20;

    let after: TransactionCursor | undefined;
    if (query.cursor) {
      const decoded = decodeCursor(query.cursor);
      if (!decoded) {
        throw new BadRequestException({
          code: ErrorCode.INVALID_INPUT,
          message: 'Invalid cursor',
        });
      }
      after = decoded;
    }

    const rows = await this.transactionsRepository.listByAccount(accountId, {
      limit: limit + 1,
      after,
    });

    const hasMore = rows.length > limit;
    const items = hasMore ? rows.slice(0, limit) : rows;
    const last = items[items.length - 1];

    return {
      items: items.map((tx) => this.formatTransaction(tx)),
      next_cursor: hasMore && last ? encodeCursor(last) : null,
    };
  }

  private async alreadyProcessed(reference: string): Promise<AlreadyProcessedException> {
    const current = await this.transactionsRepository.findByReference(reference);
    return new AlreadyProcessedException(current?.status ?? 'unknown');
  }

  private formatTransaction(tx: Transaction): TransactionResponseDto {
    return {
      id: tx.id,
      payment_intent_id: tx.stripe_payment_intent_id,
      package_type: tx.package_type,
      documents_count: tx.documents_count,
      amount: tx.amount,
      currency: tx.currency,
      status: tx.status,
      created_at: tx.created_at,
      completed_at: tx.completed_at,
    };
  }
}
