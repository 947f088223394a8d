/**
 * 账户实体（对应 accounts 表）
 * id 与 Supabase Auth 用户 id 一致，密码哈希由 Supabase Auth 保存
 */
export interface Account {
  id: string; // uuid
  email: string; // unique
  trial_started_at: string;
  trial_ends_at: string; // 创建时写入，之后不再修改
  trial_documents_used: number; // 已使用的体验文档数
  documents_balance: number; // 付费文档余额，>= 0
  total_documents_purchased: number;
  total_documents_used: number;
  subscription_active: boolean;
  stripe_subscription_id: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * 新建账户参数
 */
export interface NewAccount {
  id: string;
  email: string;
  trial_started_at: string;
  trial_ends_at: string;
}
