import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

@Injectable()
export class SupabaseService implements OnModuleInit {
  private readonly logger = new Logger(SupabaseService.name);
  private client: SupabaseClient | null = null;
  private url: string | undefined;
  private anonKey: string | undefined;

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.url = this.configService.get<string>('supabase.url');
    this.anonKey = this.configService.get<string>('supabase.anonKey');
    const serviceRoleKey = this.configService.get<string>('supabase.serviceRoleKey');

    if (!this.url || !serviceRoleKey) {
      this.logger.warn('Supabase configuration missing');
      return;
    }

    this.client = createClient(this.url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });

    this.logger.log('Supabase client initialized');
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  /**
   * service role 客户端（数据库读写、Auth admin）
   */
  getClient(): SupabaseClient {
    if (!this.client) {
      throw new Error('Supabase client is not configured');
    }
    return this.client;
  }

  /**
   * 获取数据库表
   */
  from(table: string) {
    return this.getClient().from(table);
  }

  /**
   * 用 anon key 创建一次性客户端，用于密码登录
   * 登录会话不能落在 service role 客户端上，否则后续数据库请求会带上用户 token
   */
  createAnonClient(): SupabaseClient {
    if (!this.url || !this.anonKey) {
      throw new Error('Supabase anon key is not configured');
    }
    return createClient(this.url, this.anonKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }
}
