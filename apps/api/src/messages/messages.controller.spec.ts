import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { MessagesController } from './messages.controller';
import { MessagesService } from './messages.service';
import { Message } from './message.entity';
import { MessageValidationError } from './message-text.validator';

const mockMessagesService = {
  create: jest.fn(),
  getAll: jest.fn(),
  getById: jest.fn(),
  update: jest.fn(),
  delete: jest.fn(),
};

async function notFoundBody(pending: Promise<unknown>): Promise<unknown> {
  const error: unknown = await pending.catch((failure: unknown) => failure);
  expect(error).toBeInstanceOf(NotFoundException);
  return error instanceof NotFoundException ? error.getResponse() : undefined;
}

describe('MessagesController', () => {
  let controller: MessagesController;

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [MessagesController],
      providers: [
        {
          provide: MessagesService,
          useValue: mockMessagesService,
        },
      ],
    }).compile();

    controller = module.get<MessagesController>(MessagesController);
  });

  describe('create', () => {
    it('stores the trimmed text and echoes it back', async () => {
      mockMessagesService.create.mockResolvedValue(1);

      const result = await controller.create({ text: '  Test message  ' });

      expect(mockMessagesService.create).toHaveBeenCalledWith('Test message');
      expect(result).toEqual({ id: 1, text: 'Test message', success: true });
    });

    it('rejects blank text without calling the store', async () => {
      await expect(controller.create({ text: '   ' })).rejects.toBeInstanceOf(
        MessageValidationError,
      );
      expect(mockMessagesService.create).not.toHaveBeenCalled();
    });
  });

  describe('findAll', () => {
    it('returns the stored messages', async () => {
      const expectedResult: Message[] = [
        { id: 2, text: 'Msg2', createdAt: new Date() },
        { id: 1, text: 'Msg1', createdAt: new Date() },
      ];
      mockMessagesService.getAll.mockResolvedValue(expectedResult);

      await expect(controller.findAll()).resolves.toEqual(expectedResult);
    });
  });

  describe('findOne', () => {
    it('returns the message', async () => {
      const message: Message = { id: 3, text: 'Hi', createdAt: new Date() };
      mockMessagesService.getById.mockResolvedValue(message);

      await expect(controller.findOne(3)).resolves.toBe(message);
      expect(mockMessagesService.getById).toHaveBeenCalledWith(3);
    });

    it('maps a missing message to 404', async () => {
      mockMessagesService.getById.mockResolvedValue(null);

      await expect(notFoundBody(controller.findOne(999))).resolves.toEqual({
        error: 'Message not found',
      });
    });
  });

  describe('update', () => {
    it('returns the updated message', async () => {
      const message: Message = { id: 4, text: 'new', createdAt: new Date() };
      mockMessagesService.update.mockResolvedValue(true);
      mockMessagesService.getById.mockResolvedValue(message);

      await expect(controller.update(4, { text: ' new ' })).resolves.toBe(
        message,
      );
      expect(mockMessagesService.update).toHaveBeenCalledWith(4, 'new');
    });

    it('maps a missing message to 404', async () => {
      mockMessagesService.update.mockResolvedValue(false);

      await expect(
        notFoundBody(controller.update(999, { text: 'x' })),
      ).resolves.toEqual({ error: 'Message not found' });
      expect(mockMessagesService.getById).not.toHaveBeenCalled();
    });

    it('maps a message deleted before the read-back to 404', async () => {
      mockMessagesService.update.mockResolvedValue(true);
      mockMessagesService.getById.mockResolvedValue(null);

      await expect(
        notFoundBody(controller.update(5, { text: 'x' })),
      ).resolves.toEqual({ error: 'Message not found' });
    });
  });

  describe('remove', () => {
    it('acknowledges the delete', async () => {
      mockMessagesService.delete.mockResolvedValue(true);

      await expect(controller.remove(6)).resolves.toEqual({ success: true });
      expect(mockMessagesService.delete).toHaveBeenCalledWith(6);
    });

    it('maps a missing message to 404', async () => {
      mockMessagesService.delete.mockResolvedValue(false);

      await expect(notFoundBody(controller.remove(6))).resolves.toEqual({
        error: 'Message not found',
      });
    });
  });
});
