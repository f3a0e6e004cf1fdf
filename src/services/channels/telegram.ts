import TelegramBot from 'node-telegram-bot-api';
import { NotificationChannel, ScanMessage } from './types';

export interface ChatMessenger {
  sendMessage(chatId: string, html: string): Promise<{ message_id: number }>;
}

export function createTelegramMessenger(botToken: string): ChatMessenger {
  const bot = new TelegramBot(botToken, { polling: false });
  return {
    sendMessage: (chatId, html) => bot.sendMessage(chatId, html, {
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    }),
  };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Sends the scan summary to a single Telegram chat
 */
export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(
    private chatId: string,
    private messenger: ChatMessenger
  ) {}

  async deliver(message: ScanMessage): Promise<string | undefined> {
    const html = `<b>${escapeHtml(message.subject)}</b>\n\n${escapeHtml(message.body)}`;
    const sent = await this.messenger.sendMessage(this.chatId, html);
    return String(sent.message_id);
  }
}
