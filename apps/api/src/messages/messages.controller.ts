// apps/api/src/messages/messages.controller.ts
import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { MessagesService } from './messages.service';
import { Message } from './message.entity';
import { MessageTextDto } from './message-text.dto';
import { validateMessageText } from './message-text.validator';

export interface CreateMessageResponse {
  id: number;
  text: string;
  success: true;
}

export interface DeleteMessageResponse {
  success: true;
}

const messageIdPipe = new ParseIntPipe({
  exceptionFactory: () =>
    new BadRequestException({ error: 'Invalid message id' }),
});

const messageNotFound = () =>
  new NotFoundException({ error: 'Message not found' });

@Controller('messages')
export class MessagesController {
  constructor(private readonly messagesService: MessagesService) {}

  @Get()
  async findAll(): Promise<Message[]> {
    return this.messagesService.getAll();
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  async create(
    @Body() messageTextDto: MessageTextDto,
  ): Promise<CreateMessageResponse> {
    const text = validateMessageText(messageTextDto.text);
    const id = await this.messagesService.create(text);
    return { id, text, success: true };
  }

  @Get(':id')
  async findOne(@Param('id', messageIdPipe) id: number): Promise<Message> {
    const message = await this.messagesService.getById(id);
    if (!message) {
      throw messageNotFound();
    }
    return message;
  }

  @Patch(':id')
  async update(
    @Param('id', messageIdPipe) id: number,
    @Body() messageTextDto: MessageTextDto,
  ): Promise<Message> {
    const text = validateMessageText(messageTextDto.text);
    if (!(await this.messagesService.update(id, text))) {
      throw messageNotFound();
    }
    // The row can disappear between the write and this read.
    const message = await this.messagesService.getById(id);
    if (!message) {
      throw messageNotFound();
    }
    return message;
  }

  @Delete(':id')
  async remove(
    @Param('id', messageIdPipe) id: number,
  ): Promise<DeleteMessageResponse> {
    if (!(await this.messagesService.delete(id))) {
      throw messageNotFound();
    }
    return { success: true };
  }
}
