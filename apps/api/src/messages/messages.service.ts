// apps/api/src/messages/messages.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Message } from './message.entity';
import { validateMessageText } from './message-text.validator';
import { StorageError } from '../common/errors';
import { SerialQueue } from '../common/serial-queue';

/**
 * Owns the `messages` table.
 *
 * Writes go through a single queue so that no two mutations interleave;
 * reads go straight to the repository. Every driver failure surfaces as a
 * {@link StorageError}. A missing row is reported as `null` or `false`.
 */
@Injectable()
export class MessagesService {
  private readonly writes = new SerialQueue();

  constructor(
    @InjectRepository(Message)
    private readonly messagesRepository: Repository<Message>,
  ) {}

  /** Stores a new message and resolves with its id once the row is committed. */
  async create(text: string): Promise<number> {
    const normalizedText = validateMessageText(text);

    return this.writes.run(() =>
      this.withStorage('create', async () => {
        const newMessage = this.messagesRepository.create({
          text: normalizedText,
          createdAt: new Date(),
        });
        const saved = await this.messagesRepository.save(newMessage);
        return saved.id;
      }),
    );
  }

  async getAll(): Promise<Message[]> {
    return this.withStorage('list', () =>
      this.messagesRepository.find({
        order: { createdAt: 'DESC', id: 'DESC' },
      }),
    );
  }

  async getById(id: number): Promise<Message | null> {
    return this.withStorage('read', () =>
      this.messagesRepository.findOneBy({ id }),
    );
  }

  async update(id: number, text: string): Promise<boolean> {
    const normalizedText = validateMessageText(text);

    return this.writes.run(() =>
      this.withStorage('update', () =>
        this.messagesRepository.manager.transaction(async (manager) => {
          const repository = manager.getRepository(Message);
          const existing = await repository.findOneBy({ id });
          if (!existing) {
            return false;
          }
          await repository.update({ id }, { text: normalizedText });
          return true;
        }),
      ),
    );
  }

  async delete(id: number): Promise<boolean> {
    return this.writes.run(() =>
      this.withStorage('delete', () =>
        this.messagesRepository.manager.transaction(async (manager) => {
          const repository = manager.getRepository(Message);
          const existing = await repository.findOneBy({ id });
          if (!existing) {
            return false;
          }
          await repository.delete({ id });
          return true;
        }),
      ),
    );
  }

  private async withStorage<T>(
    operation: string,
    work: () => Promise<T>,
  ): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw new StorageError(`Failed to ${operation} message(s)`, {
        cause: error,
      });
    }
  }
}
