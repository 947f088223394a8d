export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    driver: process.env.DATABASE_DRIVER || 'supabase',
  },

  supabase: {
    url: process.env.SUPABASE_URL,
    anonKey: process.env.SUPABASE_ANON_KEY,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
  },

  stripe: {
    secretKey: process.env.STRIPE_SECRET_KEY,
    webhookSecret: process.env.STRIPE_WEBHOOK_SECRET,
  },

  // 业务配置
  billing: {
    currency: process.env.CURRENCY || 'eur',
    trialPeriodDays: parseInt(process.env.TRIAL_PERIOD_DAYS || '7', 10), // 体验期天数
    trialDocumentLimit: parseInt(process.env.TRIAL_DOCUMENT_LIMIT || '3', 10), // 体验期内免费文档数
    usageLogMode: process.env.USAGE_LOG_MODE || 'all',
    packages: {
      small: {
        documents: parseInt(process.env.PACKAGE_SMALL_DOCUMENTS || '10', 10),
        amount: parseInt(process.env.PACKAGE_SMALL_PRICE || '999', 10),
      },
      medium: {
        documents: parseInt(process.env.PACKAGE_MEDIUM_DOCUMENTS || '50', 10),
        amount: parseInt(process.env.PACKAGE_MEDIUM_PRICE || '3999', 10),
      },
      large: {
        documents: parseInt(process.env.PACKAGE_LARGE_DOCUMENTS || '100', 10),
        amount: parseInt(process.env.PACKAGE_LARGE_PRICE || '6999', 10),
      },
    },
  },
});
