import { Bot } from 'grammy';
import { log } from '../utils/helpers';

export class TelegramSender {
  private bot: Bot;
  private chatId: number;

  constructor(botToken: string, chatId: number) {
    this.bot = new Bot(botToken);
    this.chatId = chatId;
  }

  getBot(): Bot {
    return this.bot;
  }

  async sendText(text: string): Promise<void> {
    await this.bot.api.sendMessage(this.chatId, text, {
      link_preview_options: { is_disabled: true },
    });
    log('info', `Message sent to group ${this.chatId}`);
  }
}
