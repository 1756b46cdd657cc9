import { CallHandler, RequestTimeoutException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { NEVER, firstValueFrom, of } from 'rxjs';
import { Timeout } from './timeout.decorator';
import { TimeoutInterceptor } from './timeout.interceptor';

class TimedController {
  @Timeout(5)
  fixed(): void {}

  @Timeout('TEST_TIMEOUT_MS')
  configured(): void {}
}

const contextFor = (handler: () => void) =>
  new ExecutionContextHost([], TimedController, handler);

const never: CallHandler = { handle: () => NEVER };

describe('TimeoutInterceptor', () => {
  const interceptor = new TimeoutInterceptor(
    new Reflector(),
    new ConfigService({ TEST_TIMEOUT_MS: 5 }),
  );

  it('passes values through before the deadline', async () => {
    const handler: CallHandler = { handle: () => of('done') };

    await expect(
      firstValueFrom(interceptor.intercept(contextFor(TimedController.prototype.fixed), handler)),
    ).resolves.toBe('done');
  });

  it('fails with 408 once a fixed timeout elapses', async () => {
    await expect(
      firstValueFrom(interceptor.intercept(contextFor(TimedController.prototype.fixed), never)),
    ).rejects.toThrow(new RequestTimeoutException('Operation timed out after 5ms'));
  });

  it('reads a timeout from configuration', async () => {
    await expect(
      firstValueFrom(
        interceptor.intercept(contextFor(TimedController.prototype.configured), never),
      ),
    ).rejects.toBeInstanceOf(RequestTimeoutException);
  });
});
