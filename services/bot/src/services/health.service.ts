import { dbHealth } from '../db/pool.js';

export type Probes = { telegram: () => boolean };

export async function readinessSvc(probes: Probes) {
  const [dbOk] = await Promise.allSettled([dbHealth()]);
  const checks = {
    db: dbOk.status === 'fulfilled' && dbOk.value ? 'ok' : 'fail',
    telegram: probes.telegram() ? 'ok' : 'fail',
  };
  const status = Object.values(checks).every((v) => v === 'ok') ? 'ready' : 'not_ready';
  return { status, checks };
}
