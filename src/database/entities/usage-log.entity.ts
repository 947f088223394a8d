/**
 * 处理结果
 */
export enum UsageOutcome {
  TRIAL = 'trial',
  BALANCE = 'balance',
  SUBSCRIPTION = 'subscription',
  REJECTED = 'rejected',
}

/**
 * 使用记录实体（对应 usage_logs 表），只追加
 */
export interface UsageLog {
  id: string;
  account_id: string;
  document_name: string | null;
  case_id: string | null;
  outcome: UsageOutcome;
  created_at: string;
}

export type NewUsageLog = Omit<UsageLog, 'id' | 'created_at'>;
