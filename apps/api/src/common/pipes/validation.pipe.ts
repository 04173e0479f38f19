// apps/api/src/common/pipes/validation.pipe.ts
import {
  BadRequestException,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';

const WHITELIST_CONSTRAINT = 'whitelistValidation';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Maps class-validator failures to `{ error }` bodies. A field the DTO does
 * not declare (a client-sent `created_at`, say) is reported before a
 * missing or mistyped one.
 */
export function toBadRequest(errors: ValidationError[]): BadRequestException {
  const unexpected = errors.find(
    (error) => error.constraints?.[WHITELIST_CONSTRAINT] !== undefined,
  );
  if (unexpected) {
    return new BadRequestException({
      error: `Unexpected field: ${unexpected.property}`,
    });
  }

  const [first] = errors;
  const field = first ? capitalize(first.property) : 'Body';
  return new BadRequestException({ error: `${field} is required` });
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: toBadRequest,
  });
}
