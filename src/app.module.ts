import { Module, DynamicModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import configuration from './common/config/configuration';
import { BillingConfigModule } from './common/config/billing-config.module';
import { DatabaseModule, resolveDatabaseDriver } from './database/database.module';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { StripeModule } from './providers/stripe/stripe.module';

// Business Modules
import { AuthModule } from './modules/auth/auth.module';
import { UsersModule } from './modules/users/users.module';
import { QuotaModule } from './modules/quota/quota.module';
import { DocumentsModule } from './modules/documents/documents.module';
import { PaymentsModule } from './modules/payments/payments.module';
import { WebhooksModule } from './modules/webhooks/webhooks.module';
import { HealthModule } from './modules/health/health.module';

// Guards
import { AuthGuard } from './common/guards/auth.guard';

export interface AppModuleOptions {
  envFilePath?: string[];
}

@Module({})
export class AppModule {
  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    // 先加载 .env，之后 process.env 才包含其中的变量
    const configModule = ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: options.envFilePath ?? ['.env.local', '.env'],
    });

    // 存储实现在启动时确定：supabase（默认）或 memory
    const driver = resolveDatabaseDriver(process.env.DATABASE_DRIVER);

    return {
      module: AppModule,
      imports: [
        // Config
        configModule,
        BillingConfigModule,
        DatabaseModule.forRoot(driver),

        // Providers
        SupabaseModule,
        StripeModule,

        // Business Modules
        AuthModule,
        UsersModule,
        QuotaModule,
        DocumentsModule,
        PaymentsModule,
        WebhooksModule,
        HealthModule,
      ],
      providers: [
        {
          provide: APP_GUARD,
          useClass: AuthGuard,
        },
      ],
    };
  }
}
