import { pg, withTx, type Queryable } from '../db/pool.js';
import { SQL } from '../db/sql.js';
import { AppError, withStoreErrors } from '../errors.js';
import { jsonParam } from '../utils/json.js';
import type { Admin, AdminActivity, AdminRole, Json, NewAdmin, User, UserType } from '../types/domain.js';

export type AdminActivityInput = {
  adminId: string;
  activityType: string;
  targetUserId?: string | null;
  details?: Json | null;
};

export async function getAdminByUserId(userId: string, db: Queryable = pg): Promise<Admin | null> {
  return withStoreErrors('admin', async () => {
    const { rows } = await db.query<Admin>(SQL.admins.byUserId, [userId]);
    return rows[0] ?? null;
  });
}

/**
 * FOREIGN_KEY_VIOLATION when no user row exists for `userId`,
 * DUPLICATE_KEY when the user is already an admin.
 */
export async function createAdmin(fields: NewAdmin, db: Queryable = pg): Promise<Admin> {
  return withStoreErrors('admin', async () => {
    const { rows } = await db.query<Admin>(SQL.admins.insert, [fields.userId, fields.role, fields.createdBy]);
    const row = rows[0];
    if (!row) throw new AppError('NOT_FOUND', `admin ${fields.userId} not returned after insert`);
    return row;
  });
}

/** Inserts the admin and its audit row together. */
export async function grantAdmin(fields: NewAdmin, audit: AdminActivityInput): Promise<Admin> {
  return withStoreErrors('admin', () =>
    withTx(async (tx) => {
      const admin = await createAdmin(fields, tx);
      await insertAdminActivity(tx, audit);
      return admin;
    }),
  );
}

export async function updateAdminRole(userId: string, role: AdminRole, changedBy: string): Promise<Admin> {
  return withStoreErrors('admin', () =>
    withTx(async (tx) => {
      const before = await lockAdmin(tx, userId);
      const { rows } = await tx.query<Admin>(SQL.admins.updateRole, [userId, role]);
      const after = rows[0] ?? { ...before, role };
      await insertAdminActivity(tx, {
        adminId: changedBy,
        activityType: 'role_change',
        targetUserId: userId,
        details: { from: before.role, to: role },
      });
      return after;
    }),
  );
}

export async function setAdminActive(userId: string, active: boolean, changedBy: string): Promise<Admin> {
  return withStoreErrors('admin', () =>
    withTx(async (tx) => {
      const before = await lockAdmin(tx, userId);
      const { rows } = await tx.query<Admin>(SQL.admins.setActive, [userId, active]);
      const after = rows[0] ?? { ...before, isActive: active };
      await insertAdminActivity(tx, {
        adminId: changedBy,
        activityType: active ? 'admin_activate' : 'admin_deactivate',
        targetUserId: userId,
        details: { from: before.isActive, to: active },
      });
      return after;
    }),
  );
}

export async function updateUserTypeAudited(
  userId: string,
  from: UserType,
  to: UserType,
  changedBy: string,
): Promise<User> {
  return withStoreErrors('user', () =>
    withTx(async (tx) => {
      const { rows } = await tx.query<User>(SQL.users.updateType, [userId, to]);
      const user = rows[0];
      if (!user) throw new AppError('NOT_FOUND', `user ${userId} not found`);
      await insertAdminActivity(tx, {
        adminId: changedBy,
        activityType: 'user_update',
        targetUserId: userId,
        details: { from, to },
      });
      return user;
    }),
  );
}

export async function listAdmins(): Promise<Admin[]> {
  return withStoreErrors('admin', async () => {
    const { rows } = await pg.query<Admin>(SQL.admins.list);
    return rows;
  });
}

export async function appendAdminActivity(input: AdminActivityInput, db: Queryable = pg): Promise<void> {
  await withStoreErrors('admin activity', () => insertAdminActivity(db, input));
}

export async function listAdminActivity(adminId: string, limit = 20): Promise<AdminActivity[]> {
  return withStoreErrors('admin activity', async () => {
    const { rows } = await pg.query<AdminActivity>(SQL.adminActivities.listByAdmin, [adminId, limit]);
    return rows;
  });
}

async function lockAdmin(tx: Queryable, userId: string): Promise<Admin> {
  const { rows } = await tx.query<Admin>(SQL.admins.lockByUserId, [userId]);
  const row = rows[0];
  if (!row) throw new AppError('NOT_FOUND', `no admin for ${userId}`);
  return row;
}

async function insertAdminActivity(db: Queryable, input: AdminActivityInput) {
  await db.query(SQL.adminActivities.insert, [
    input.adminId,
    input.activityType,
    input.targetUserId ?? null,
    jsonParam(input.details),
  ]);
}
