// Reply texts. Only English ships; other languages fall back to it.
const EN = {
  welcome_text:
    'Welcome to CryptoAnalyst Bot! 🚀\n\n' +
    'I can help you analyze cryptocurrencies with technical analysis and charts. ' +
    'Select an option below to get started.',
  admin_welcome: 'Welcome to CryptoAnalyst Bot Admin Panel\n\nHow can I help you? Select an option below.',
  error_no_permission: "You don't have permission to use this bot.",
  not_authorized: 'You are not authorized to use admin commands.',
  error_generic: 'Something went wrong. Please try again later.',
  enter_coin: 'Please enter a coin symbol or id (e.g. btc, ethereum).',
  coin_not_found: 'Coin "{coin}" was not found.',
  not_found: 'Not found: {what}',
  help:
    'Use /analyze, /quick, /news or /chart followed by a coin symbol.\n' +
    'Settings: /language <code>, /timeframe <1|7|30|90>, /charttype <price|candle>.',
  language_set: 'Language set to {language}.',
  language_invalid: 'Please send a two-letter language code, e.g. /language en.',
  timeframe_set: 'Timeframe set to {days} days.',
  timeframe_invalid: 'Please send one of 1, 7, 30 or 90, e.g. /timeframe 7.',
  chart_type_set: 'Chart type set to {type}.',
  chart_type_invalid: 'Please send price or candle, e.g. /charttype candle.',
  admin_usage:
    'Admin commands:\n' +
    '/admin role <user> <master|normal|watcher>\n' +
    '/admin add <user> [role]\n' +
    '/admin enable|disable <user>\n' +
    '/admin ban|unban|premium|guest <user>\n' +
    '/admin list',
  admin_done: 'Done: {what}',
  admin_exists: '{user} is already an admin.',
} as const;

export type MessageKey = keyof typeof EN;

const CATALOG: Record<string, Partial<Record<MessageKey, string>>> = { en: EN };

export function t(key: MessageKey, language = 'en', vars: Record<string, string> = {}): string {
  const template = CATALOG[language]?.[key] ?? EN[key];
  return template.replace(/\{(\w+)\}/g, (m, name: string) => vars[name] ?? m);
}
