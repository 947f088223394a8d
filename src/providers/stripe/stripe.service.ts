import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { UpstreamUnavailableException } from '../../common/exceptions/domain.exceptions';

/**
 * PaymentIntent 中业务需要的字段
 */
export interface PaymentIntentSummary {
  id: string;
  client_secret: string | null;
  status: Stripe.PaymentIntent.Status;
  amount: number;
  currency: string;
  latest_charge: string | null;
  metadata: Record<string, string>;
}

export interface CreatePaymentIntentParams {
  amount: number;
  currency: string;
  metadata: Record<string, string>;
  idempotencyKey?: string;
}

export function toPaymentIntentSummary(intent: Stripe.PaymentIntent): PaymentIntentSummary {
  const charge = intent.latest_charge;
  return {
    id: intent.id,
    client_secret: intent.client_secret,
    status: intent.status,
    amount: intent.amount,
    currency: intent.currency,
    latest_charge: typeof charge === 'string' ? charge : charge?.id ?? null,
    metadata: intent.metadata,
  };
}

@Injectable()
export class StripeService implements OnModuleInit {
  private readonly logger = new Logger(StripeService.name);
  private stripe: Stripe | null = null;
  private webhookSecret = '';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    const secretKey = this.configService.get<string>('stripe.secretKey');
    this.webhookSecret = this.configService.get<string>('stripe.webhookSecret') || '';

    if (!secretKey) {
      this.logger.warn('Stripe secret key not configured');
      return;
    }

    this.stripe = new Stripe(secretKey);

    this.logger.log('Stripe service initialized');
  }

  isConfigured(): boolean {
    return this.stripe !== null;
  }

  getClient(): Stripe {
    if (!this.stripe) {
      throw new UpstreamUnavailableException('Payment processor');
    }
    return this.stripe;
  }

  /**
   * 验证 Webhook 签名
   */
  constructEvent(payload: string | Buffer, signature: string): Stripe.Event {
    return this.getClient().webhooks.constructEvent(
      payload,
      signature,
      this.webhookSecret,
    );
  }

  /**
   * 创建 PaymentIntent（待支付）
   */
  async createPaymentIntent(params: CreatePaymentIntentParams): Promise<PaymentIntentSummary> {
    const intent = await this.call('paymentIntents.create', () =>
      this.getClient().paymentIntents.create(
        {
          amount: params.amount,
          currency: params.currency,
          automatic_payment_methods: { enabled: true },
          metadata: params.metadata,
        },
        params.idempotencyKey ? { idempotencyKey: params.idempotencyKey } : undefined,
      ),
    );
    return toPaymentIntentSummary(intent);
  }

  /**
   * 查询 PaymentIntent 当前状态
   */
  async retrievePaymentIntent(paymentIntentId: string): Promise<PaymentIntentSummary> {
    const intent = await this.call('paymentIntents.retrieve', () =>
      this.getClient().paymentIntents.retrieve(paymentIntentId),
    );
    return toPaymentIntentSummary(intent);
  }

  /**
   * 取消未完成的 PaymentIntent
   * 已不可取消（已支付、处理中或已取消）时返回 Stripe 上的最新状态
   */
  async cancelPaymentIntent(paymentIntentId: string): Promise<PaymentIntentSummary> {
    try {
      const intent = await this.call('paymentIntents.cancel', () =>
        this.getClient().paymentIntents.cancel(paymentIntentId),
      );
      return toPaymentIntentSummary(intent);
    } catch (err) {
      if (
        err instanceof Stripe.errors.StripeInvalidRequestError &&
        err.code === 'payment_intent_unexpected_state'
      ) {
        this.logger.warn(`PaymentIntent ${paymentIntentId} not cancelable: ${err.message}`);
        return this.retrievePaymentIntent(paymentIntentId);
      }
      throw err;
    }
  }

  /**
   * 网络错误、限流和 Stripe 5xx 视为可重试，其余错误原样抛出
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (
        err instanceof Stripe.errors.StripeConnectionError ||
        err instanceof Stripe.errors.StripeAPIError ||
        err instanceof Stripe.errors.StripeRateLimitError
      ) {
        this.logger.warn(`Stripe ${operation} failed: ${err.message}`);
        throw new UpstreamUnavailableException('Payment processor');
      }
      throw err;
    }
  }
}
