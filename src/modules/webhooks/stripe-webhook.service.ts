import { Injectable, Logger, BadRequestException } from '@nestjs/common';
import Stripe from 'stripe';
import { StripeService, toPaymentIntentSummary } from '../../providers/stripe/stripe.service';
import { AccountsRepository } from '../../database/repositories';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { PaymentsService } from '../payments/payments.service';

const ACTIVE_SUBSCRIPTION_STATUSES: ReadonlySet<Stripe.Subscription.Status> = new Set<Stripe.Subscription.Status>([
  'active',
  'trialing',
]);

@Injectable()
export class StripeWebhookService {
  private readonly logger = new Logger(StripeWebhookService.name);

  constructor(
    private stripeService: StripeService,
    private paymentsService: PaymentsService,
    private accountsRepository: AccountsRepository,
  ) {}

  /**
   * 处理 Stripe Webhook
   * 重复投递由交易状态守卫去重
   */
  async handleWebhook(rawBody: Buffer, signature: string): Promise<void> {
    let event: Stripe.Event;

    try {
      event = this.stripeService.constructEvent(rawBody, signature);
    } catch (err) {
      this.logger.error(`Webhook signature verification failed: ${err}`);
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: 'Invalid signature',
      });
    }

    await this.dispatch(event);
  }

  async dispatch(event: Stripe.Event): Promise<void> {
    this.logger.log(`Processing Stripe event: ${event.type} (${event.id})`);

    switch (event.type) {
      case 'payment_intent.succeeded':
        await this.paymentsService.applySucceededIntent(toPaymentIntentSummary(event.data.object));
        break;
      case 'payment_intent.payment_failed':
      case 'payment_intent.canceled':
        await this.paymentsService.applyFailedIntent(toPaymentIntentSummary(event.data.object));
        break;
      case 'customer.subscription.created':
      case 'customer.subscription.updated':
      case 'customer.subscription.deleted':
        await this.handleSubscriptionChange(event.data.object, event.type);
        break;
      default:
        this.logger.log(`Unhandled event type: ${event.type}`);
    }
  }

  private async handleSubscriptionChange(
    subscription: Stripe.Subscription,
    eventType: string,
  ): Promise<void> {
    const accountId = subscription.metadata.account_id;
    if (!accountId) {
      this.logger.warn(`Subscription ${subscription.id} has no account_id metadata`);
      return;
    }

    const active =
      eventType !== 'customer.subscription.deleted' &&
      ACTIVE_SUBSCRIPTION_STATUSES.has(subscription.status);

    const account = await this.accountsRepository.updateSubscription(accountId, {
      active,
      subscriptionId: subscription.id,
    });

    if (!account) {
      this.logger.warn(`No account found for subscription ${subscription.id}`);
      return;
    }

    this.logger.log(`Subscription ${subscription.id} for account ${accountId}: active=${active}`);
  }
}
