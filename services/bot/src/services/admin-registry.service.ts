import {
  getAdminByUserId,
  grantAdmin,
  listAdmins,
  setAdminActive,
  updateAdminRole,
  updateUserTypeAudited,
} from '../repositories/admins.repo.js';
import { getUserByTelegramId } from '../repositories/users.repo.js';
import { resolveOrCreateUser } from './user-directory.service.js';
import { AppError, isAppError } from '../errors.js';
import { logger } from '../logger.js';
import { AdminRole, ROLE_RANK, type Admin, type User, type UserType } from '../types/domain.js';

export async function getActiveAdmin(identity: string): Promise<Admin | null> {
  const admin = await getAdminByUserId(identity);
  return admin && admin.isActive ? admin : null;
}

export async function isAuthorized(identity: string): Promise<boolean> {
  return (await getActiveAdmin(identity)) !== null;
}

async function requireActor(identity: string, minRole: AdminRole): Promise<Admin> {
  const admin = await getActiveAdmin(identity);
  if (!admin || ROLE_RANK[admin.role] < ROLE_RANK[minRole]) {
    throw new AppError('PERMISSION_DENIED', `${identity} needs ${minRole} or higher`);
  }
  return admin;
}

/**
 * Grants MASTER to every listed identity that has no admin row yet.
 * Running it again is a no-op for identities already present; returns the
 * identities created on this run.
 */
export async function bootstrapAdmins(identities: readonly string[], creator: string): Promise<string[]> {
  const created: string[] = [];
  for (const identity of identities) {
    if (await getAdminByUserId(identity)) continue;

    await resolveOrCreateUser(identity);
    try {
      await grantAdmin(
        { userId: identity, role: AdminRole.MASTER, createdBy: creator },
        { adminId: identity, activityType: 'admin_bootstrap', targetUserId: identity, details: { createdBy: creator } },
      );
    } catch (err) {
      if (!isAppError(err, 'DUPLICATE_KEY')) throw err;
      continue;
    }
    created.push(identity);
  }
  if (created.length) logger.info({ created, creator }, 'bootstrap admins granted');
  return created;
}

// Only an active MASTER may change roles.
export async function changeRole(identity: string, newRole: AdminRole, changedBy: string): Promise<Admin> {
  await requireActor(changedBy, AdminRole.MASTER);
  const admin = await updateAdminRole(identity, newRole, changedBy);
  logger.info({ identity, role: newRole, changedBy }, 'admin role changed');
  return admin;
}

export async function setAdminActivation(identity: string, active: boolean, changedBy: string): Promise<Admin> {
  await requireActor(changedBy, AdminRole.MASTER);
  if (identity === changedBy) throw new AppError('PERMISSION_DENIED', 'admins cannot toggle themselves');
  return setAdminActive(identity, active, changedBy);
}

export async function addAdmin(identity: string, role: AdminRole, createdBy: string): Promise<Admin> {
  await requireActor(createdBy, AdminRole.MASTER);
  await resolveOrCreateUser(identity);
  return grantAdmin(
    { userId: identity, role, createdBy },
    { adminId: createdBy, activityType: 'admin_add', targetUserId: identity, details: { role } },
  );
}

/**
 * Ban, unban or promote a user. NORMAL admins may moderate ordinary users;
 * changing the type of an active admin takes a MASTER.
 */
export async function setUserType(identity: string, userType: UserType, changedBy: string): Promise<User> {
  const actor = await requireActor(changedBy, AdminRole.NORMAL);
  const target = await getUserByTelegramId(identity);
  if (!target) throw new AppError('NOT_FOUND', `user ${identity} not found`);

  if (actor.role !== AdminRole.MASTER && (await getActiveAdmin(identity))) {
    throw new AppError('PERMISSION_DENIED', 'only a master may change an admin');
  }
  if (target.userType === userType) return target;
  return updateUserTypeAudited(identity, target.userType, userType, changedBy);
}

export async function listAdminRoster(requestedBy: string): Promise<Admin[]> {
  await requireActor(requestedBy, AdminRole.WATCHER);
  return listAdmins();
}
