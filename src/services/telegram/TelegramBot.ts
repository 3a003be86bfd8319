import { Bot, BotError, GrammyError, HttpError, InputFile } from 'grammy';
import type { Message } from 'grammy/types';
import { createServiceLogger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { ChatAction, ChatTransport, InboundMessage } from './types.js';

const logger = createServiceLogger('TelegramBot');

/**
 * Any inbound message counts, text or not, so that a first photo or sticker
 * still claims the bot. Messages without a sender (channel posts) are dropped.
 */
export function toInboundMessage(message: Message): InboundMessage | null {
  const senderId = message.from?.id;
  if (senderId === undefined) {
    return null;
  }
  return {
    chatId: message.chat.id,
    messageId: message.message_id,
    senderId,
    text: message.text ?? '',
  };
}

/**
 * grammY adapter: long polling in, Bot API calls out.
 * Incoming messages are handed to `onMessage` and never awaited, so one
 * slow download does not hold up the update loop.
 */
export class TelegramBot implements ChatTransport {
  private readonly bot: Bot;
  private botUsername: string | undefined;

  constructor(token: string) {
    this.bot = new Bot(token);
  }

  get username(): string | undefined {
    return this.botUsername;
  }

  async start(onMessage: (message: InboundMessage) => void): Promise<void> {
    this.bot.on('message', ctx => {
      const message = toInboundMessage(ctx.message);
      if (message) {
        onMessage(message);
      }
    });

    this.bot.catch((err: BotError) => {
      const { error } = err;
      const context = { updateId: err.ctx.update.update_id };
      if (error instanceof GrammyError) {
        logger.error('Telegram API error', { ...context, description: error.description });
      } else if (error instanceof HttpError) {
        logger.error('Could not reach Telegram', { ...context, error: getErrorMessage(error.error) });
      } else {
        logger.error('Telegram handler error', { ...context, error: getErrorMessage(error) });
      }
    });

    await this.bot.init();
    this.botUsername = this.bot.botInfo.username;

    this.bot
      .start({
        onStart: info => {
          logger.info('Telegram bot started', { username: info.username });
        },
      })
      .catch(error => {
        logger.error('Telegram polling stopped', { error: getErrorMessage(error) });
      });
  }

  async stop(): Promise<void> {
    if (this.bot.isRunning()) {
      await this.bot.stop();
      logger.info('Telegram bot stopped');
    }
  }

  async sendText(chatId: number, text: string, replyToMessageId: number): Promise<void> {
    await this.bot.api.sendMessage(chatId, text, {
      reply_parameters: { message_id: replyToMessageId },
    });
  }

  async sendVideo(chatId: number, filePath: string, replyToMessageId: number): Promise<void> {
    await this.bot.api.sendVideo(chatId, new InputFile(filePath), {
      supports_streaming: true,
      reply_parameters: { message_id: replyToMessageId },
    });
  }

  async sendChatAction(chatId: number, action: ChatAction): Promise<void> {
    await this.bot.api.sendChatAction(chatId, action);
  }
}
