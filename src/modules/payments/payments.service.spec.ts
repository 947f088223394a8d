import { BadRequestException, Logger } from '@nestjs/common';
import { PaymentsService } from './payments.service';
import { CreateIntentDto } from './dto/payment.dto';
import {
  AlreadyProcessedException,
  PaymentNotCompletedException,
  UnknownTransactionException,
  UpstreamUnavailableException,
} from '../../common/exceptions/domain.exceptions';
import { PackageType, TransactionStatus } from '../../database/entities';
import { MemoryDatabase } from '../../database/repositories/memory/memory-database';
import { FakeStripeService } from '../../../test/support/fake-stripe.service';
import { createServiceTestingModule } from '../../../test/support/testing-module';
import { seedAccount, seedExpiredTrialAccount } from '../../../test/support/accounts';

describe('PaymentsService', () => {
  let service: PaymentsService;
  let stripe: FakeStripeService;
  let db: MemoryDatabase;

  beforeEach(async () => {
    const context = await createServiceTestingModule([PaymentsService]);
    service = context.moduleRef.get(PaymentsService);
    stripe = context.stripe;
    db = context.moduleRef.get(MemoryDatabase);
  });

  describe('createIntent', () => {
    it('creates a pending transaction priced from the package table', async () => {
      const account = seedAccount(db);

      const result = await service.createIntent(account.id, { package_type: PackageType.SMALL });

      expect(result).toEqual({
        payment_intent_id: 'pi_test_1',
        client_secret: 'pi_test_1_secret_test',
        amount: 999,
        currency: 'eur',
        documents_count: 10,
      });
      expect(stripe.createPaymentIntent).toHaveBeenCalledWith({
        amount: 999,
        currency: 'eur',
        metadata: {
          account_id: account.id,
          package_type: 'small',
          documents_count: '10',
        },
      });

      const transaction = db.transactions.get('pi_test_1');
      expect(transaction?.status).toBe(TransactionStatus.PENDING);
      expect(transaction?.amount).toBe(999);
      expect(transaction?.documents_count).toBe(10);
      expect(db.accounts.get(account.id)?.documents_balance).toBe(0);
    });

    it('rejects an unknown package type before calling the processor', async () => {
      const account = seedAccount(db);

      await expect(
        service.createIntent(account.id, Object.assign(new CreateIntentDto(), { package_type: 'huge' })),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(stripe.createPaymentIntent).not.toHaveBeenCalled();
      expect(db.transactions.size).toBe(0);
    });

    it('writes nothing when the processor is unreachable', async () => {
      const account = seedAccount(db);
      stripe.createPaymentIntent.mockRejectedValueOnce(
        new UpstreamUnavailableException('Payment processor'),
      );

      await expect(
        service.createIntent(account.id, { package_type: PackageType.MEDIUM }),
      ).rejects.toBeInstanceOf(UpstreamUnavailableException);
      expect(db.transactions.size).toBe(0);
    });
  });

  describe('confirm', () => {
    it('credits the package documents once the processor reports success', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.MEDIUM });
      stripe.setStatus(intent.payment_intent_id, 'succeeded');

      const result = await service.confirm(account.id, {
        payment_intent_id: intent.payment_intent_id,
      });

      expect(result).toEqual({ status: 'succeeded', documents_added: 50, new_balance: 50 });
      const transaction = db.transactions.get(intent.payment_intent_id);
      expect(transaction?.status).toBe(TransactionStatus.SUCCEEDED);
      expect(transaction?.stripe_charge_id).toBe(`ch_${intent.payment_intent_id}`);
      expect(transaction?.completed_at).not.toBeNull();
      expect(db.accounts.get(account.id)?.total_documents_purchased).toBe(50);
    });

    it('credits only once when confirmation is retried', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'succeeded');

      await service.confirm(account.id, { payment_intent_id: intent.payment_intent_id });
      await expect(
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toBeInstanceOf(AlreadyProcessedException);

      expect(db.accounts.get(account.id)?.documents_balance).toBe(10);
    });

    it('credits only once when two confirmations race', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'succeeded');

      const results = await Promise.allSettled([
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(AlreadyProcessedException);
      expect(db.accounts.get(account.id)?.documents_balance).toBe(10);
    });

    it('fails with UnknownTransaction for an unknown reference and changes nothing', async () => {
      const account = seedAccount(db, { documents_balance: 2 });

      await expect(
        service.confirm(account.id, { payment_intent_id: 'pi_unknown' }),
      ).rejects.toBeInstanceOf(UnknownTransactionException);

      expect(stripe.retrievePaymentIntent).not.toHaveBeenCalled();
      expect(db.accounts.get(account.id)?.documents_balance).toBe(2);
    });

    it("does not let an account confirm another account's purchase", async () => {
      const owner = seedAccount(db);
      const other = seedAccount(db);
      const intent = await service.createIntent(owner.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'succeeded');

      await expect(
        service.confirm(other.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toBeInstanceOf(UnknownTransactionException);
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(
        TransactionStatus.PENDING,
      );
    });

    it('reports a processing charge as not yet complete without changing state', async () => {
      const account = seedAccount(db, { documents_balance: 4 });
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'processing');

      const result = await service.confirm(account.id, {
        payment_intent_id: intent.payment_intent_id,
      });

      expect(result).toEqual({ status: 'processing', documents_added: 0, new_balance: 4 });
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(
        TransactionStatus.PENDING,
      );
    });

    it('marks the transaction failed when the charge did not succeed', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.LARGE });
      stripe.setStatus(intent.payment_intent_id, 'canceled');

      const error = await service
        .confirm(account.id, { payment_intent_id: intent.payment_intent_id })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PaymentNotCompletedException);
      expect(error).toMatchObject({ details: { processor_status: 'canceled' } });
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(TransactionStatus.FAILED);
      expect(db.accounts.get(account.id)?.documents_balance).toBe(0);

      // 失败是终态
      stripe.setStatus(intent.payment_intent_id, 'succeeded');
      await expect(
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toBeInstanceOf(AlreadyProcessedException);
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(TransactionStatus.FAILED);
    });

    it('cancels an unfinished intent before marking it failed', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'requires_action');

      await expect(
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toMatchObject({ details: { processor_status: 'requires_action' } });

      expect(stripe.cancelPaymentIntent).toHaveBeenCalledWith(intent.payment_intent_id);
      expect(stripe.intents.get(intent.payment_intent_id)?.status).toBe('canceled');
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(TransactionStatus.FAILED);
    });

    it('credits the purchase when the customer paid before the cancel went through', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'requires_action');
      stripe.cancelPaymentIntent.mockImplementationOnce(async (id: string) => {
        stripe.setStatus(id, 'succeeded');
        return stripe.retrievePaymentIntent(id);
      });

      const result = await service.confirm(account.id, {
        payment_intent_id: intent.payment_intent_id,
      });

      expect(result).toEqual({ status: 'succeeded', documents_added: 10, new_balance: 10 });
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(
        TransactionStatus.SUCCEEDED,
      );

      // 随后到达的 succeeded 回调不会重复加余额
      const summary = await stripe.retrievePaymentIntent(intent.payment_intent_id);
      await expect(service.applySucceededIntent(summary)).resolves.toBe(false);
      expect(db.accounts.get(account.id)?.documents_balance).toBe(10);
    });

    it('leaves the transaction pending when the cancel cannot reach the processor', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'requires_payment_method');
      stripe.cancelPaymentIntent.mockRejectedValueOnce(
        new UpstreamUnavailableException('Payment processor'),
      );

      await expect(
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toBeInstanceOf(UpstreamUnavailableException);
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(
        TransactionStatus.PENDING,
      );
    });

    it('leaves the transaction pending when the processor is unreachable', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.retrievePaymentIntent.mockRejectedValueOnce(
        new UpstreamUnavailableException('Payment processor'),
      );

      await expect(
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toBeInstanceOf(UpstreamUnavailableException);
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(
        TransactionStatus.PENDING,
      );
    });

    it('credits the amount stored at creation even if the price table changed since', async () => {
      const account = seedExpiredTrialAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      const stored = db.transactions.get(intent.payment_intent_id);
      if (stored) {
        // 模拟旧价格表下创建的订单
        stored.documents_count = 12;
        stored.amount = 1099;
      }
      stripe.setStatus(intent.payment_intent_id, 'succeeded');

      const result = await service.confirm(account.id, {
        payment_intent_id: intent.payment_intent_id,
      });

      expect(result.new_balance).toBe(12);
    });
  });

  describe('webhook outcomes', () => {
    it('does not double-credit when the webhook and the client both confirm', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'succeeded');
      const summary = await stripe.retrievePaymentIntent(intent.payment_intent_id);

      await expect(service.applySucceededIntent(summary)).resolves.toBe(true);
      await expect(service.applySucceededIntent(summary)).resolves.toBe(false);
      await expect(
        service.confirm(account.id, { payment_intent_id: intent.payment_intent_id }),
      ).rejects.toBeInstanceOf(AlreadyProcessedException);

      expect(db.accounts.get(account.id)?.documents_balance).toBe(10);
    });

    it('logs an error when a charge succeeds for a transaction marked failed', async () => {
      const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      await service.applyFailedIntent(await stripe.retrievePaymentIntent(intent.payment_intent_id));
      stripe.setStatus(intent.payment_intent_id, 'succeeded');

      await expect(
        service.applySucceededIntent(await stripe.retrievePaymentIntent(intent.payment_intent_id)),
      ).resolves.toBe(false);

      const transactionId = db.transactions.get(intent.payment_intent_id)?.id;
      expect(errorSpy).toHaveBeenCalledWith(
        `PaymentIntent ${intent.payment_intent_id} succeeded but transaction ${transactionId} is marked failed`,
      );
      errorSpy.mockRestore();
    });

    it('ignores failure events for transactions that already succeeded', async () => {
      const account = seedAccount(db);
      const intent = await service.createIntent(account.id, { package_type: PackageType.SMALL });
      stripe.setStatus(intent.payment_intent_id, 'succeeded');
      const summary = await stripe.retrievePaymentIntent(intent.payment_intent_id);
      await service.applySucceededIntent(summary);

      await expect(service.applyFailedIntent(summary)).resolves.toBe(false);
      expect(db.transactions.get(intent.payment_intent_id)?.status).toBe(
        TransactionStatus.SUCCEEDED,
      );
    });
  });

  describe('listTransactions', () => {
    it('pages through the history newest first', async () => {
      const account = seedAccount(db);
      const other = seedAccount(db);
      await service.createIntent(other.id, { package_type: PackageType.SMALL });
      for (const type of [PackageType.SMALL, PackageType.MEDIUM, PackageType.LARGE]) {
        await service.createIntent(account.id, { package_type: type });
      }
      // 固定时间戳，保证顺序可预期
      const times = ['2025-01-01T00:00:01.000Z', '2025-01-01T00:00:02.000Z', '2025-01-01T00:00:03.000Z'];
      ['pi_test_2', 'pi_test_3', 'pi_test_4'].forEach((id, index) => {
        const tx = db.transactions.get(id);
        if (tx) {
          tx.created_at = times[index];
        }
      });

      const first = await service.listTransactions(account.id, { limit: 2 });
      expect(first.items.map((tx) => tx.package_type)).toEqual(['large', 'medium']);
      expect(first.next_cursor).not.toBeNull();

      const second = await service.listTransactions(account.id, {
        limit: 2,
        cursor: first.next_cursor ?? undefined,
      });
      expect(second.items.map((tx) => tx.payment_intent_id)).toEqual(['pi_test_2']);
      expect(second.next_cursor).toBeNull();
    });

    it('rejects a malformed cursor', async () => {
      const account = seedAccount(db);

      await expect(
        service.listTransactions(account.id, { limit: 5, cursor: 'not-a-cursor' }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });
});
