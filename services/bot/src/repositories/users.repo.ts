import { pg, withTx, type Queryable } from '../db/pool.js';
import { SQL } from '../db/sql.js';
import { AppError, withStoreErrors } from '../errors.js';
import { jsonParam } from '../utils/json.js';
import type { NewUser, User, UserActivity } from '../types/domain.js';

export async function getUserByTelegramId(telegramId: string, db: Queryable = pg): Promise<User | null> {
  return withStoreErrors('user', async () => {
    const { rows } = await db.query<User>(SQL.users.byTelegramId, [telegramId]);
    return rows[0] ?? null;
  });
}

// DUPLICATE_KEY when the telegram id is already taken
export async function createUser(fields: NewUser, db: Queryable = pg): Promise<User> {
  return withStoreErrors('user', async () => {
    const { rows } = await db.query<User>(SQL.users.insert, [
      fields.telegramId,
      fields.username ?? null,
      fields.userType ?? null,
      fields.language ?? null,
      fields.preferredChartType ?? null,
      fields.preferredTimeframe ?? null,
    ]);
    return mustHaveRow(rows[0], fields.telegramId);
  });
}

export async function updateUserLanguage(telegramId: string, language: string): Promise<User> {
  return withStoreErrors('user', async () => {
    const { rows } = await pg.query<User>(SQL.users.updateLanguage, [telegramId, language]);
    return mustHaveRow(rows[0], telegramId);
  });
}

export async function updateUserPreferences(
  telegramId: string,
  prefs: { chartType?: string; timeframe?: number },
): Promise<User> {
  return withStoreErrors('user', async () => {
    const { rows } = await pg.query<User>(SQL.users.updatePreferences, [
      telegramId,
      prefs.chartType ?? null,
      prefs.timeframe ?? null,
    ]);
    return mustHaveRow(rows[0], telegramId);
  });
}

/** Appends the activity row and bumps last_active in one transaction. */
export async function recordUserActivity(activity: UserActivity): Promise<void> {
  await withStoreErrors('user activity', () =>
    withTx(async (tx) => {
      await tx.query(SQL.userActivities.insert, [
        activity.userId,
        activity.coinId,
        activity.activityType,
        activity.ts,
        jsonParam(activity.details),
      ]);
      await tx.query(SQL.users.touch, [activity.userId]);
    }),
  );
}

export async function listUserActivity(telegramId: string, limit = 20): Promise<UserActivity[]> {
  return withStoreErrors('user activity', async () => {
    const { rows } = await pg.query<UserActivity>(SQL.userActivities.listByUser, [telegramId, limit]);
    return rows;
  });
}

function mustHaveRow(row: User | undefined, telegramId: string): User {
  if (!row) throw new AppError('NOT_FOUND', `user ${telegramId} not found`);
  return row;
}
