import { Module } from '@nestjs/common';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Product, ChatLog } from '@retail-insights/database';
import { HealthController } from './health.controller';
import { CatalogModule } from './catalog/catalog.module';
import { ChatLogModule } from './chat-log/chat-log.module';
import { GeneratorModule } from './generator/generator.module';
import { InsightsModule } from './insights/insights.module';
import { ObservabilityInterceptor } from './common/observability.interceptor';
import { throttlerOptions } from './common/throttle.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => throttlerOptions(config),
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST'),
        port: parseInt(configService.get<string>('DB_PORT') || '5432', 10),
        username: configService.get<string>('DB_USERNAME'),
        password: configService.get<string>('DB_PASSWORD'),
        database: configService.get<string>('DB_DATABASE'),
        // DB_SSL=true: TLS without certificate validation
        ssl: configService.get<string>('DB_SSL') === 'true' ? { rejectUnauthorized: false } : false,
        entities: [Product, ChatLog],
        migrations: [__dirname + '/database/migrations/*{.ts,.js}'],
        migrationsRun: configService.get<string>('DB_MIGRATIONS_RUN') !== 'false',
        synchronize: false,
      }),
      inject: [ConfigService],
    }),
    CatalogModule,
    ChatLogModule,
    GeneratorModule,
    InsightsModule,
  ],
  controllers: [HealthController],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_INTERCEPTOR, useClass: ObservabilityInterceptor },
  ],
})
export class AppModule {}
