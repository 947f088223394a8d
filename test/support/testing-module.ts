import { Provider } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  BILLING_CONFIG,
  BillingConfig,
  BillingConfigInput,
  createBillingConfig,
} from '../../src/common/config/billing.config';
import { DatabaseModule } from '../../src/database/database.module';
import { StripeService } from '../../src/providers/stripe/stripe.service';
import { CredentialsService } from '../../src/modules/auth/credentials.service';
import { FakeStripeService } from './fake-stripe.service';
import { FakeCredentialsService } from './fake-credentials.service';

export const DEFAULT_BILLING: BillingConfigInput = {
  currency: 'eur',
  trialPeriodDays: 7,
  trialDocumentLimit: 3,
  usageLogMode: 'all',
  packages: {
    small: { documents: 10, amount: 999 },
    medium: { documents: 50, amount: 3999 },
    large: { documents: 100, amount: 6999 },
  },
};

export interface ServiceTestContext {
  moduleRef: TestingModule;
  stripe: FakeStripeService;
  credentials: FakeCredentialsService;
  billingConfig: BillingConfig;
}

/**
 * 使用 memory 存储和外部服务替身组装测试模块
 */
export async function createServiceTestingModule(
  providers: Provider[],
  billing: Partial<BillingConfigInput> = {},
): Promise<ServiceTestContext> {
  const stripe = new FakeStripeService();
  const credentials = new FakeCredentialsService();
  const billingConfig = createBillingConfig({ ...DEFAULT_BILLING, ...billing });

  const moduleRef = await Test.createTestingModule({
    imports: [DatabaseModule.forRoot('memory')],
    providers: [
      { provide: BILLING_CONFIG, useValue: billingConfig },
      { provide: StripeService, useValue: stripe },
      { provide: CredentialsService, useValue: credentials },
      ...providers,
    ],
  }).compile();

  return { moduleRef, stripe, credentials, billingConfig };
}
