import { Account } from '../../database/entities';

export type QuotaReason = 'subscription' | 'trial' | 'balance' | 'quota_exceeded';

export interface QuotaDecision {
  allowed: boolean;
  reason: QuotaReason;
  /** 体验期窗口是否仍然有效 */
  is_trial: boolean;
  trial_documents_remaining: number;
  documents_remaining: number;
}

/**
 * 额度判定（纯函数）
 * 优先级：订阅 > 体验期免费文档 > 付费余额
 * 体验期内最多免费处理 trialDocumentLimit 篇，过期后剩余免费额度作废
 */
export function evaluateQuota(
  account: Account,
  now: Date,
  trialDocumentLimit: number,
): QuotaDecision {
  const isTrial = now.getTime() < new Date(account.trial_ends_at).getTime();
  const trialRemaining = isTrial
    ? Math.max(trialDocumentLimit - account.trial_documents_used, 0)
    : 0;

  let reason: QuotaReason = 'quota_exceeded';
  if (account.subscription_active) {
    reason = 'subscription';
  } else if (trialRemaining > 0) {
    reason = 'trial';
  } else if (account.documents_balance > 0) {
    reason = 'balance';
  }

  return {
    allowed: reason !== 'quota_exceeded',
    reason,
    is_trial: isTrial,
    trial_documents_remaining: trialRemaining,
    documents_remaining: account.documents_balance + trialRemaining,
  };
}
