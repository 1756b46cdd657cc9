import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { logger } from './core/logger/logger.config';

async function bootstrap() {
  const pinoLogger = logger();

  // the webhook route mounts its own raw body parser
  const app = await NestFactory.create(AppModule, {
    logger: false,
    bodyParser: false,
  });

  app.setGlobalPrefix('api');
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3001);
  await app.listen(port);

  pinoLogger.info(`Application running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error(
    {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    },
    'Failed to start application',
  );
  process.exit(1);
});
