// apps/api/src/messages/message-text.validator.ts

export const MESSAGE_TEXT_MAX_LENGTH = 500;

export type MessageValidationCode = 'EmptyText' | 'TextTooLong';

export class MessageValidationError extends Error {
  constructor(
    public readonly code: MessageValidationCode,
    message: string,
  ) {
    super(message);
    this.name = 'MessageValidationError';
  }
}

/**
 * Normalizes raw message text for storage.
 *
 * Leading and trailing whitespace is dropped; the result must be non-empty
 * and at most {@link MESSAGE_TEXT_MAX_LENGTH} code points long.
 *
 * @returns the trimmed text
 * @throws MessageValidationError with code `EmptyText` or `TextTooLong`
 */
export function validateMessageText(rawText: string): string {
  const text = rawText.trim();

  if (text.length === 0) {
    throw new MessageValidationError('EmptyText', 'Text must not be empty');
  }

  if (Array.from(text).length > MESSAGE_TEXT_MAX_LENGTH) {
    throw new MessageValidationError(
      'TextTooLong',
      `Text must be at most ${MESSAGE_TEXT_MAX_LENGTH} characters`,
    );
  }

  return text;
}
