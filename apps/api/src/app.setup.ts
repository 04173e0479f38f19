// apps/api/src/app.setup.ts
import { ClassSerializerInterceptor, INestApplication } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { StoreExceptionFilter } from './common/filters/store-exception.filter';

export const DEFAULT_API_PREFIX = 'api/v1';

/** Global prefix, pipes, filters and serialization shared by main.ts and the e2e suite. */
export function configureApp<T extends INestApplication>(
  app: T,
  apiPrefix: string = DEFAULT_API_PREFIX,
): T {
  app.setGlobalPrefix(apiPrefix);
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new StoreExceptionFilter());
  // Renames createdAt to created_at on the way out.
  app.useGlobalInterceptors(
    new ClassSerializerInterceptor(app.get(Reflector)),
  );
  return app;
}
