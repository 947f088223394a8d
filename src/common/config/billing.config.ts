import { ConfigService } from '@nestjs/config';
import { PackageType } from '../../database/entities';

export const BILLING_CONFIG = Symbol('BILLING_CONFIG');

export type UsageLogMode = 'all' | 'successful' | 'off';

const USAGE_LOG_MODES: readonly UsageLogMode[] = ['all', 'successful', 'off'];

export interface PackageDefinition {
  readonly type: PackageType;
  readonly documents: number;
  readonly amount: number; // 最小货币单位
}

/**
 * 计费配置，启动时构建一次，之后只读
 */
export interface BillingConfig {
  readonly currency: string;
  readonly trialPeriodDays: number;
  readonly trialDocumentLimit: number;
  readonly usageLogMode: UsageLogMode;
  readonly packages: Readonly<Record<PackageType, PackageDefinition>>;
}

export interface BillingConfigInput {
  currency: string;
  trialPeriodDays: number;
  trialDocumentLimit: number;
  usageLogMode: string;
  packages: Record<PackageType, { documents: number; amount: number }>;
}

function isUsageLogMode(value: string): value is UsageLogMode {
  return USAGE_LOG_MODES.some((mode) => mode === value);
}

function assertPositiveInteger(name: string, value: number, allowZero = false): void {
  const min = allowZero ? 0 : 1;
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid billing config: ${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * 校验并冻结计费配置
 */
export function createBillingConfig(input: BillingConfigInput): BillingConfig {
  if (!/^[a-z]{3}$/.test(input.currency)) {
    throw new Error(`Invalid billing config: currency "${input.currency}"`);
  }
  assertPositiveInteger('trialPeriodDays', input.trialPeriodDays);
  assertPositiveInteger('trialDocumentLimit', input.trialDocumentLimit, true);

  if (!isUsageLogMode(input.usageLogMode)) {
    throw new Error(`Invalid billing config: usageLogMode "${input.usageLogMode}"`);
  }

  const definition = (type: PackageType): PackageDefinition => {
    const entry = input.packages[type];
    assertPositiveInteger(`packages.${type}.documents`, entry.documents);
    assertPositiveInteger(`packages.${type}.amount`, entry.amount);
    return Object.freeze({ type, documents: entry.documents, amount: entry.amount });
  };

  const packages: Record<PackageType, PackageDefinition> = {
    [PackageType.SMALL]: definition(PackageType.SMALL),
    [PackageType.MEDIUM]: definition(PackageType.MEDIUM),
    [PackageType.LARGE]: definition(PackageType.LARGE),
  };

  return Object.freeze({
    currency: input.currency,
    trialPeriodDays: input.trialPeriodDays,
    trialDocumentLimit: input.trialDocumentLimit,
    usageLogMode: input.usageLogMode,
    packages: Object.freeze(packages),
  });
}

export const billingConfigProvider = {
  provide: BILLING_CONFIG,
  useFactory: (configService: ConfigService): BillingConfig =>
    createBillingConfig(configService.getOrThrow<BillingConfigInput>('billing')),
  inject: [ConfigService],
};
