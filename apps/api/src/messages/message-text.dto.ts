// apps/api/src/messages/message-text.dto.ts
import { IsString } from 'class-validator';

// Emptiness and length are checked by validateMessageText, after trimming.
export class MessageTextDto {
  @IsString()
  text!: string;
}
