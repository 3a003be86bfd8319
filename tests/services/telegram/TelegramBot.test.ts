import { describe, it, expect } from '@jest/globals';
import type { Message } from 'grammy/types';
import { toInboundMessage } from '../../../src/services/telegram/TelegramBot.js';

const chat = { id: 500, type: 'private', first_name: 'Owner' } as const;
const from = { id: 111, is_bot: false, first_name: 'Owner' };

describe('toInboundMessage', () => {
  it('should carry text messages through', () => {
    const message: Message = { message_id: 9, date: 0, chat, from, text: 'https://youtu.be/abc123' };

    expect(toInboundMessage(message)).toEqual({
      chatId: 500,
      messageId: 9,
      senderId: 111,
      text: 'https://youtu.be/abc123',
    });
  });

  it('should keep messages without text so they can claim the bot', () => {
    const location: Message = {
      message_id: 10,
      date: 0,
      chat,
      from,
      location: { latitude: 52.5, longitude: 13.4 },
    };

    expect(toInboundMessage(location)).toEqual({ chatId: 500, messageId: 10, senderId: 111, text: '' });
  });

  it('should drop messages without a sender', () => {
    const message: Message = { message_id: 11, date: 0, chat, text: 'hello' };

    expect(toInboundMessage(message)).toBeNull();
  });
});
