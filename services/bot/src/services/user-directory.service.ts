import {
  createUser,
  getUserByTelegramId,
  recordUserActivity,
  updateUserLanguage,
  updateUserPreferences,
} from '../repositories/users.repo.js';
import { AppError, isAppError } from '../errors.js';
import { logger } from '../logger.js';
import { activityWriteFailures } from '../metrics/metrics.js';
import { UserType, isChartType, isTimeInterval, type Json, type User } from '../types/domain.js';

export type Profile = { username?: string | null };

const LANGUAGE_RE = /^[a-z]{2}$/;

/**
 * Looks the identity up and lazily creates a guest on first contact.
 * A DUPLICATE_KEY on create means a concurrent first contact won the race,
 * so the row is simply re-read.
 */
export async function resolveOrCreateUser(identity: string, profile: Profile = {}): Promise<User> {
  const existing = await getUserByTelegramId(identity);
  if (existing) return existing;

  try {
    await createUser({ telegramId: identity, username: profile.username ?? null });
    logger.info({ identity }, 'user created');
  } catch (err) {
    if (!isAppError(err, 'DUPLICATE_KEY')) throw err;
    logger.debug({ identity }, 'user created concurrently; re-reading');
  }

  const user = await getUserByTelegramId(identity);
  if (!user) throw new AppError('NOT_FOUND', `user ${identity} missing after create`);
  return user;
}

export function isBanned(user: User): boolean {
  return user.userType === UserType.BANNED;
}

export async function setLanguage(user: User, language: string): Promise<User> {
  const lang = language.trim().toLowerCase();
  if (!LANGUAGE_RE.test(lang)) throw new AppError('VALIDATION_ERROR', `unsupported language "${language}"`);
  return updateUserLanguage(user.telegramId, lang);
}

export async function setPreferences(
  user: User,
  prefs: { chartType?: string; timeframe?: number },
): Promise<User> {
  if (prefs.timeframe !== undefined && !isTimeInterval(prefs.timeframe)) {
    throw new AppError('VALIDATION_ERROR', `timeframe must be one of 1, 7, 30, 90`);
  }
  if (prefs.chartType !== undefined && !isChartType(prefs.chartType)) {
    throw new AppError('VALIDATION_ERROR', `chart type must be price or candle`);
  }
  return updateUserPreferences(user.telegramId, prefs);
}

export async function recordActivity(
  user: User,
  coinId: string,
  activityType: string,
  details: Json | null = null,
): Promise<void> {
  await recordUserActivity({
    userId: user.telegramId,
    coinId,
    activityType,
    ts: Math.floor(Date.now() / 1000),
    details,
  });
}

/** Fire-and-forget variant for reply paths; a failed write is logged and counted. */
export function trackActivity(user: User, coinId: string, activityType: string, details: Json | null = null): void {
  recordActivity(user, coinId, activityType, details).catch((err: unknown) => {
    activityWriteFailures.inc();
    logger.error({ err, identity: user.telegramId, coinId, activityType }, 'activity write failed');
  });
}
