import { Bot } from 'grammy';
import { GroupAssistant } from '../services/group-assistant';
import { log } from '../utils/helpers';

export const ALLOWED_UPDATES = ['message', 'chat_member'] as const;

export type ChatResponder = Pick<GroupAssistant, 'priceReport' | 'replyTo' | 'welcomeFor' | 'reloadResponses'>;

export interface HandlerOptions {
  healthReport?: () => string;
}

// "/Price@SomeBot args" -> "price"; null when addressed to another bot
export function parseCommand(text: string, length: number, botUsername: string): string | null {
  const [name, target] = text.slice(1, length).split('@');
  if (target && target.toLowerCase() !== botUsername.toLowerCase()) return null;
  return name.toLowerCase();
}

export function registerHandlers(bot: Bot, responder: ChatResponder, options: HandlerOptions = {}): void {
  bot.on('message:text', async (ctx) => {
    const replyOptions = { reply_parameters: { message_id: ctx.msg.message_id } };

    const command = ctx.msg.entities?.find(e => e.type === 'bot_command' && e.offset === 0);
    if (command) {
      switch (parseCommand(ctx.msg.text, command.length, ctx.me.username)) {
        case 'price':
          await ctx.reply(await responder.priceReport(), replyOptions);
          break;
        case 'reload':
          await ctx.reply(responder.reloadResponses(), replyOptions);
          break;
        case 'health':
          if (options.healthReport) {
            await ctx.reply(options.healthReport());
          }
          break;
      }
      return;
    }

    const reply = await responder.replyTo(ctx.msg.text);
    if (reply === null) return;
    await ctx.reply(reply, replyOptions);
  });

  bot.on('chat_member', async (ctx) => {
    const { chat, old_chat_member: before, new_chat_member: after } = ctx.chatMember;
    const welcome = responder.welcomeFor({
      oldStatus: before.status,
      newStatus: after.status,
      user: {
        id: after.user.id,
        firstName: after.user.first_name,
        lastName: after.user.last_name,
      },
    });
    if (!welcome) return;
    await ctx.api.sendMessage(chat.id, welcome, { parse_mode: 'HTML' });
  });

  bot.catch((err) => {
    log('error', 'Update handler failed', {
      updateId: err.ctx.update.update_id,
      error: String(err.error),
    });
  });
}
