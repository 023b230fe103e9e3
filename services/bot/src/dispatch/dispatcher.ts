import { SessionStore } from '../session/session-store.js';
import {
  isBanned,
  resolveOrCreateUser,
  setLanguage,
  setPreferences,
  trackActivity,
} from '../services/user-directory.service.js';
import {
  addAdmin,
  changeRole,
  isAuthorized,
  listAdminRoster,
  setAdminActivation,
  setUserType,
} from '../services/admin-registry.service.js';
import { findCoinBySymbol } from '../repositories/coins.repo.js';
import { config } from '../config.js';
import { isAppError } from '../errors.js';
import { forConversation } from '../logger.js';
import { botCommands } from '../metrics/metrics.js';
import { AdminRole, UserType, isAdminRole, isChartType, isTimeInterval, type User } from '../types/domain.js';
import { t } from './messages.js';
import {
  ANALYSIS_FEATURES,
  isAnalysisFeature,
  type AnalysisFeature,
  type AnalysisPort,
  type InboundEvent,
  type Reply,
  type SessionState,
} from './types.js';

const USER_TYPE_SUBCOMMANDS = new Map<string, UserType>([
  ['ban', UserType.BANNED],
  ['unban', UserType.GUEST],
  ['guest', UserType.GUEST],
  ['premium', UserType.PREMIUM],
]);

// metric labels come from this set only; anything else a user types is 'unknown'
const KNOWN_COMMANDS: ReadonlySet<string> = new Set([
  'start',
  'admin',
  'id',
  'language',
  'timeframe',
  'charttype',
  ...ANALYSIS_FEATURES,
]);

function commandLabel(event: InboundEvent): string {
  if (event.kind === 'message') return 'message';
  return KNOWN_COMMANDS.has(event.command) ? event.command : 'unknown';
}

function text(value: string): Reply {
  return { kind: 'text', text: value };
}

function normalizeIdentity(raw: string) {
  return raw.trim().replace(/^@/, '').toLowerCase();
}

export class Dispatcher {
  readonly sessions: SessionStore<SessionState>;

  constructor(
    private readonly analysis: AnalysisPort,
    sessions: SessionStore<SessionState> = new SessionStore<SessionState>({ ttlMs: config.sessionTtlMs }),
  ) {
    this.sessions = sessions;
  }

  /**
   * Handles one inbound event. Events of the same conversation run one at a
   * time in arrival order. Never rejects: failures become a reply.
   */
  dispatch(event: InboundEvent): Promise<Reply> {
    return this.sessions.runExclusive(event.conversationId, () => this.handleSafely(event));
  }

  private async handleSafely(event: InboundEvent): Promise<Reply> {
    const label = commandLabel(event);
    const log = forConversation(event.identity, event.conversationId);
    // English until the user row is read
    let language = 'en';
    let reply: Reply;
    try {
      const user = await resolveOrCreateUser(event.identity, { username: event.username });
      language = user.language;
      reply = await this.handle(event, user);
    } catch (err) {
      if (isAppError(err, 'PERMISSION_DENIED')) {
        reply = { kind: 'denied', reason: 'not_authorized', text: t('not_authorized', language) };
      } else if (isAppError(err, 'NOT_FOUND')) {
        reply = text(t('not_found', language, { what: err.message }));
      } else if (isAppError(err, 'VALIDATION_ERROR')) {
        reply = text(err.message);
      } else {
        log.error({ err, command: label }, 'dispatch failed');
        reply = { kind: 'error', text: t('error_generic', language) };
      }
    }
    botCommands.inc({ command: label, outcome: reply.kind });
    return reply;
  }

  private async handle(event: InboundEvent, user: User): Promise<Reply> {
    // banned users get nothing else, and nothing stateful happens for them
    if (isBanned(user)) {
      return { kind: 'denied', reason: 'banned', text: t('error_no_permission', user.language) };
    }

    if (event.kind === 'message') return this.onMessage(user, event.conversationId, event.text);

    const { command, args } = event;
    if (command === 'start') return { kind: 'menu', menu: 'main', text: t('welcome_text', user.language) };
    if (command === 'admin') return this.onAdmin(user, args);
    if (command === 'id') return text(user.telegramId);
    if (command === 'language') return this.onLanguage(user, args);
    if (command === 'timeframe') return this.onTimeframe(user, args);
    if (command === 'charttype') return this.onChartType(user, args);
    if (isAnalysisFeature(command)) return this.onFeature(user, event.conversationId, command, args);
    return text(t('help', user.language));
  }

  private async onFeature(user: User, conversationId: string, feature: AnalysisFeature, args: string[]) {
    const query = args.join(' ').trim();
    if (!query) {
      this.sessions.set(conversationId, { awaiting: 'coin', feature });
      return text(t('enter_coin', user.language));
    }
    this.sessions.clear(conversationId);
    return this.runFeature(user, feature, query);
  }

  private async onMessage(user: User, conversationId: string, body: string): Promise<Reply> {
    const state = this.sessions.get(conversationId);
    if (!state) return text(t('help', user.language));
    this.sessions.clear(conversationId);
    return this.runFeature(user, state.feature, body.trim());
  }

  private async runFeature(user: User, feature: AnalysisFeature, query: string): Promise<Reply> {
    const coin = await findCoinBySymbol(query);
    if (!coin) return text(t('coin_not_found', user.language, { coin: query }));
    const report = await this.analysis.run(feature, coin, user);
    trackActivity(user, coin.id, feature, { query });
    return text(report);
  }

  private async onLanguage(user: User, args: string[]): Promise<Reply> {
    const [code] = args;
    if (!code) return text(t('language_invalid', user.language));
    try {
      const updated = await setLanguage(user, code);
      return text(t('language_set', updated.language, { language: updated.language }));
    } catch (err) {
      if (isAppError(err, 'VALIDATION_ERROR')) return text(t('language_invalid', user.language));
      throw err;
    }
  }

  private async onTimeframe(user: User, args: string[]): Promise<Reply> {
    const days = Number(args[0]);
    if (!isTimeInterval(days)) return text(t('timeframe_invalid', user.language));
    const updated = await setPreferences(user, { timeframe: days });
    return text(t('timeframe_set', updated.language, { days: String(updated.preferredTimeframe) }));
  }

  private async onChartType(user: User, args: string[]): Promise<Reply> {
    const type = (args[0] ?? '').toLowerCase();
    if (!isChartType(type)) return text(t('chart_type_invalid', user.language));
    const updated = await setPreferences(user, { chartType: type });
    return text(t('chart_type_set', updated.language, { type: updated.preferredChartType }));
  }

  private async onAdmin(user: User, args: string[]): Promise<Reply> {
    const actor = user.telegramId;
    if (!(await isAuthorized(actor))) {
      return { kind: 'denied', reason: 'not_authorized', text: t('not_authorized', user.language) };
    }
    if (args.length === 0) return { kind: 'menu', menu: 'admin', text: t('admin_welcome', user.language) };

    const [sub = '', rawTarget = '', extra] = args;
    const target = normalizeIdentity(rawTarget);
    const lang = user.language;

    if (sub === 'list') {
      const admins = await listAdminRoster(actor);
      return text(admins.map((a) => `${a.userId} ${a.role}${a.isActive ? '' : ' (inactive)'}`).join('\n'));
    }
    if (!target) return text(t('admin_usage', lang));

    if (sub === 'role') {
      if (!isAdminRole(extra)) return text(t('admin_usage', lang));
      await changeRole(target, extra, actor);
      return text(t('admin_done', lang, { what: `${target} is now ${extra}` }));
    }
    if (sub === 'add') {
      const role = extra ?? AdminRole.NORMAL;
      if (!isAdminRole(role)) return text(t('admin_usage', lang));
      try {
        await addAdmin(target, role, actor);
      } catch (err) {
        if (isAppError(err, 'DUPLICATE_KEY')) return text(t('admin_exists', lang, { user: target }));
        throw err;
      }
      return text(t('admin_done', lang, { what: `${target} added as ${role}` }));
    }
    if (sub === 'enable' || sub === 'disable') {
      await setAdminActivation(target, sub === 'enable', actor);
      return text(t('admin_done', lang, { what: `${target} ${sub}d` }));
    }
    const userType = USER_TYPE_SUBCOMMANDS.get(sub);
    if (userType) {
      await setUserType(target, userType, actor);
      return text(t('admin_done', lang, { what: `${target} is now ${userType}` }));
    }
    return text(t('admin_usage', lang));
  }
}
