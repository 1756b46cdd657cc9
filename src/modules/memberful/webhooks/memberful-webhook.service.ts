import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { logger } from '../../../core/logger/logger.config';
import {
  MemberfulWebhookEvent,
  RawPayload,
  processWebhook,
} from '../../../domain/memberful';

/**
 * Verifies and decodes incoming webhook bodies with the configured secret
 */
@Injectable()
export class MemberfulWebhookService {
  private readonly logger = logger();
  private readonly secret: string | null;

  constructor(private readonly configService: ConfigService) {
    this.secret = this.configService.get<string>('MEMBERFUL_WEBHOOK_SECRET') || null;
    const requireSignature = this.configService.get<boolean>(
      'MEMBERFUL_REQUIRE_SIGNATURE',
      false,
    );

    if (!this.secret) {
      if (requireSignature) {
        throw new Error(
          'MEMBERFUL_REQUIRE_SIGNATURE is enabled but MEMBERFUL_WEBHOOK_SECRET is not configured',
        );
      }
      this.logger.warn(
        'MEMBERFUL_WEBHOOK_SECRET is not configured, webhook signatures will not be verified',
      );
    }
  }

  get verifiesSignatures(): boolean {
    return this.secret !== null;
  }

  process(rawBody: RawPayload, signature?: string | null): MemberfulWebhookEvent {
    return processWebhook(rawBody, signature, { secret: this.secret });
  }
}
