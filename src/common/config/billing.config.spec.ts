import { createBillingConfig } from './billing.config';
import { PackageType } from '../../database/entities';
import { DEFAULT_BILLING } from '../../../test/support/testing-module';

describe('createBillingConfig', () => {
  it('builds a frozen price table', () => {
    const config = createBillingConfig(DEFAULT_BILLING);

    expect(config.packages[PackageType.SMALL]).toEqual({ type: 'small', documents: 10, amount: 999 });
    expect(config.packages[PackageType.LARGE]).toEqual({ type: 'large', documents: 100, amount: 6999 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.packages)).toBe(true);
    expect(Object.isFrozen(config.packages[PackageType.MEDIUM])).toBe(true);
  });

  it('rejects an unknown usage log mode', () => {
    expect(() => createBillingConfig({ ...DEFAULT_BILLING, usageLogMode: 'sometimes' })).toThrow(
      'Invalid billing config: usageLogMode "sometimes"',
    );
  });

  it('rejects a non-positive package price', () => {
    expect(() =>
      createBillingConfig({
        ...DEFAULT_BILLING,
        packages: { ...DEFAULT_BILLING.packages, medium: { documents: 50, amount: 0 } },
      }),
    ).toThrow('Invalid billing config: packages.medium.amount must be an integer >= 1, got 0');
  });

  it('rejects a trial period that did not parse', () => {
    expect(() => createBillingConfig({ ...DEFAULT_BILLING, trialPeriodDays: Number.NaN })).toThrow(
      'Invalid billing config: trialPeriodDays must be an integer >= 1, got NaN',
    );
  });

  it('allows a trial without free documents', () => {
    expect(createBillingConfig({ ...DEFAULT_BILLING, trialDocumentLimit: 0 }).trialDocumentLimit).toBe(0);
  });
});
