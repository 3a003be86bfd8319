/**
 * Ports between the bot logic and the chat platform
 */

export interface InboundMessage {
  chatId: number;
  messageId: number;
  senderId: number;
  text: string;
}

export type ChatAction = 'upload_video';

/**
 * Outbound side of a chat. Every reply quotes the message it answers.
 */
export interface ChatTransport {
  sendText(chatId: number, text: string, replyToMessageId: number): Promise<void>;
  /** Sent as a streamable video */
  sendVideo(chatId: number, filePath: string, replyToMessageId: number): Promise<void>;
  sendChatAction(chatId: number, action: ChatAction): Promise<void>;
}

/**
 * Durable home of the owner id
 */
export interface OwnerStore {
  save(ownerId: number): Promise<void>;
}
