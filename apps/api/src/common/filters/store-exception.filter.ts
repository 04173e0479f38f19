// apps/api/src/common/filters/store-exception.filter.ts
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { StorageError } from '../errors';
import { MessageValidationError } from '../../messages/message-text.validator';

export interface ErrorResponse {
  error: string;
  code?: string;
}

/**
 * Turns validator and storage failures into HTTP responses.
 * HttpExceptions thrown by controllers are left to Nest's own handler.
 */
@Catch(MessageValidationError, StorageError)
export class StoreExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(StoreExceptionFilter.name);

  catch(
    exception: MessageValidationError | StorageError,
    host: ArgumentsHost,
  ): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof MessageValidationError) {
      const body: ErrorResponse = {
        error: exception.message,
        code: exception.code,
      };
      response.status(HttpStatus.BAD_REQUEST).json(body);
      return;
    }

    const cause =
      exception.cause instanceof Error ? exception.cause : exception;
    this.logger.error(`${exception.message}: ${cause.message}`, cause.stack);

    const body: ErrorResponse = { error: 'Internal server error' };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}
