// services/bot/src/config.ts
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),

  DATABASE_URL: z.string().optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().optional(),
  PGDATABASE: z.string().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),

  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),

  // identities granted MASTER at startup (csv of usernames)
  BOOTSTRAP_ADMINS: z.string().default(''),
  BOOTSTRAP_CREATOR: z.string().min(1).default('system'),

  // unanswered coin prompts are forgotten after this long
  SESSION_TTL_SEC: z.coerce.number().int().positive().default(300),

  OPS_PORT: z.coerce.number().int().nonnegative().default(0),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  console.error('Invalid environment:', parsed.error.flatten());
  process.exit(1);
}
const e = parsed.data;

function toArray(csv?: string): string[] {
  return (csv ?? '')
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

function buildPgUrl() {
  if (e.DATABASE_URL) return e.DATABASE_URL;
  if (e.PGHOST && e.PGUSER && e.PGDATABASE) {
    const pw = e.PGPASSWORD ? `:${encodeURIComponent(e.PGPASSWORD)}` : '';
    const host = encodeURIComponent(e.PGHOST);
    const port = e.PGPORT ? `:${e.PGPORT}` : '';
    return `postgres://${encodeURIComponent(e.PGUSER)}${pw}@${host}${port}/${encodeURIComponent(e.PGDATABASE)}`;
  }
  return undefined;
}

export const config = {
  env: e.NODE_ENV,

  databaseUrl: buildPgUrl(),
  telegramToken: e.TELEGRAM_BOT_TOKEN,

  bootstrap: {
    // telegram usernames are case-insensitive; identities are kept lowercase
    admins: toArray(e.BOOTSTRAP_ADMINS).map((name) => name.replace(/^@/, '').toLowerCase()),
    creator: e.BOOTSTRAP_CREATOR,
  },

  sessionTtlMs: e.SESSION_TTL_SEC * 1000,
  opsPort: e.OPS_PORT,
  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',
} as const;
