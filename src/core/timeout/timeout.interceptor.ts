import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  RequestTimeoutException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { Observable, throwError, TimeoutError } from 'rxjs';
import { catchError, timeout } from 'rxjs/operators';
import { logger } from '../logger/logger.config';
import { TIMEOUT_KEY } from './timeout.decorator';

const DEFAULT_TIMEOUT_MS = 30000;

@Injectable()
export class TimeoutInterceptor implements NestInterceptor {
  private readonly logger = logger();

  constructor(
    private readonly reflector: Reflector,
    private readonly configService: ConfigService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const timeoutMs = this.resolveTimeout(context);

    return next.handle().pipe(
      timeout(timeoutMs),
      catchError((err: unknown) => {
        if (err instanceof TimeoutError) {
          this.logger.error({ timeoutMs }, 'TimeoutInterceptor: Request timed out');
          return throwError(
            () => new RequestTimeoutException(`Operation timed out after ${timeoutMs}ms`),
          );
        }
        return throwError(() => err);
      }),
    );
  }

  private resolveTimeout(context: ExecutionContext): number {
    const setting = this.reflector.getAllAndOverride<number | string | undefined>(
      TIMEOUT_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (typeof setting === 'string') {
      return this.configService.get<number>(setting, DEFAULT_TIMEOUT_MS);
    }
    return setting ?? DEFAULT_TIMEOUT_MS;
  }
}
