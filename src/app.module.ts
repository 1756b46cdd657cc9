import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { validate } from './core/config/env.validation';
import { CoreModule } from './core/core.module';
import { HealthModule } from './modules/health/health.module';
import { MemberfulApiModule } from './modules/memberful/api/memberful-api.module';
import { MemberfulWebhooksModule } from './modules/memberful/webhooks/memberful-webhooks.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate,
    }),
    CoreModule,
    MemberfulApiModule,
    MemberfulWebhooksModule,
    HealthModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
