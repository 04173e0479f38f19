import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp, DEFAULT_API_PREFIX } from './app.setup';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const port = parseInt(configService.get<string>('PORT') || '3000', 10);
  const apiPrefix = configService.get<string>('API_PREFIX') || DEFAULT_API_PREFIX;

  configureApp(app, apiPrefix);

  // Closes the database connection on SIGTERM/SIGINT.
  app.enableShutdownHooks();

  await app.listen(port, '0.0.0.0');
  logger.log(`Application is running on: http://0.0.0.0:${port}/${apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
