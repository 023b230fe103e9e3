import { Markup, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { logger } from '../logger.js';
import type { Dispatcher } from '../dispatch/dispatcher.js';
import type { InboundEvent, Reply } from '../dispatch/types.js';

export type Sender = { id: number; username?: string };

// "/cmd@BotName arg1 arg2"
const COMMAND_RE = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

export function parseCommand(body: string): { command: string; args: string[] } | null {
  const m = COMMAND_RE.exec(body.trim());
  if (!m) return null;
  const args = (m[2] ?? '').split(/\s+/).filter(Boolean);
  return { command: m[1].toLowerCase(), args };
}

// Usernames are what admins are configured by; fall back to the numeric id when unset.
// Telegram matches usernames case-insensitively, so the identity is lowercased.
export function identityOf(from: Sender): string {
  return from.username ? from.username.toLowerCase() : String(from.id);
}

export function toInboundEvent(chatId: number, from: Sender, body: string): InboundEvent {
  const base = { conversationId: String(chatId), identity: identityOf(from), username: from.username ?? null };
  const parsed = parseCommand(body);
  return parsed
    ? { ...base, kind: 'command', command: parsed.command, args: parsed.args }
    : { ...base, kind: 'message', text: body };
}

const MAIN_MENU = Markup.keyboard([
  ['/analyze', '/quick'],
  ['/news', '/chart'],
]).resize();

const ADMIN_MENU = Markup.keyboard([
  ['/admin list'],
  ['/start'],
]).resize();

export function renderReply(reply: Reply) {
  if (reply.kind === 'menu') return { text: reply.text, markup: reply.menu === 'admin' ? ADMIN_MENU : MAIN_MENU };
  return { text: reply.text, markup: undefined };
}

export function createTelegramBot(token: string, dispatcher: Dispatcher) {
  const bot = new Telegraf(token);

  bot.on(message('text'), async (ctx) => {
    const event = toInboundEvent(ctx.chat.id, ctx.message.from, ctx.message.text);
    const out = renderReply(await dispatcher.dispatch(event));
    await ctx.reply(out.text, out.markup);
  });

  bot.catch((err, ctx) => {
    logger.error({ err, updateId: ctx.update.update_id }, 'telegram update failed');
  });

  return bot;
}
