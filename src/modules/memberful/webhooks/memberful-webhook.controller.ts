import {
  BadRequestException,
  Controller,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Post,
  Req,
  UnauthorizedException,
  UseInterceptors,
} from '@nestjs/common';
import { Request } from 'express';
import { logger } from '../../../core/logger/logger.config';
import { Timeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import {
  InvalidSignatureError,
  MalformedPayloadError,
  MemberfulWebhookEvent,
  SIGNATURE_HEADER,
  UnsupportedEventTypeError,
  ValidationError,
  WebhookEventType,
} from '../../../domain/memberful';
import { MemberfulWebhookService } from './memberful-webhook.service';
import { WebhookHandlerRegistry } from './webhook-handler.registry';

export interface WebhookAcknowledgement {
  status: 'success';
  eventType: WebhookEventType;
  message: string;
}

@Controller('webhooks/memberful')
@UseInterceptors(TimeoutInterceptor)
export class MemberfulWebhookController {
  private readonly logger = logger();

  constructor(
    private readonly webhookService: MemberfulWebhookService,
    private readonly registry: WebhookHandlerRegistry,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @Timeout('WEBHOOK_TIMEOUT_MS')
  async receive(
    @Req() req: Request,
    @Headers(SIGNATURE_HEADER) signature?: string,
  ): Promise<WebhookAcknowledgement> {
    // populated by the raw body parser mounted on this route
    const body: unknown = req.body;
    const rawBody = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

    let event: MemberfulWebhookEvent;
    try {
      event = this.webhookService.process(rawBody, signature);
    } catch (error: unknown) {
      throw this.toHttpException(error);
    }

    try {
      const handlersInvoked = await this.registry.dispatch(event);
      this.logger.debug({ eventType: event.event, handlersInvoked }, 'Webhook handled');
    } catch (error: unknown) {
      this.logger.error(
        {
          eventType: event.event,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        'Webhook handler failed',
      );
      throw new InternalServerErrorException('Webhook processing failed');
    }

    return {
      status: 'success',
      eventType: event.event,
      message: 'Webhook processed successfully',
    };
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof InvalidSignatureError) {
      this.logger.warn({ error: error.message }, 'Rejected webhook with invalid signature');
      return new UnauthorizedException(error.message);
    }

    if (
      error instanceof UnsupportedEventTypeError ||
      error instanceof ValidationError ||
      error instanceof MalformedPayloadError
    ) {
      this.logger.warn({ type: error.name, error: error.message }, 'Rejected webhook payload');
      return new BadRequestException({
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        type: error.name,
        message: error.message,
      });
    }

    this.logger.error(
      {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Unexpected webhook failure',
    );
    return new InternalServerErrorException('Webhook processing failed');
  }
}
