export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

// enum -> persisted value; the db never sees anything else
export const UserType = { GUEST: 'guest', PREMIUM: 'premium', BANNED: 'banned' } as const;
export type UserType = (typeof UserType)[keyof typeof UserType];

export const AdminRole = { MASTER: 'master', NORMAL: 'normal', WATCHER: 'watcher' } as const;
export type AdminRole = (typeof AdminRole)[keyof typeof AdminRole];

export const TimeInterval = { ONE_DAY: 1, SEVEN_DAYS: 7, THIRTY_DAYS: 30, NINETY_DAYS: 90 } as const;
export type TimeInterval = (typeof TimeInterval)[keyof typeof TimeInterval];

export const ChartType = { PRICE: 'price', CANDLE: 'candle' } as const;
export type ChartType = (typeof ChartType)[keyof typeof ChartType];

export const ROLE_RANK: Record<AdminRole, number> = { master: 3, normal: 2, watcher: 1 };

const ADMIN_ROLES: readonly string[] = Object.values(AdminRole);
const INTERVALS: readonly number[] = Object.values(TimeInterval);
const CHART_TYPES: readonly string[] = Object.values(ChartType);

export function isAdminRole(v: unknown): v is AdminRole {
  return typeof v === 'string' && ADMIN_ROLES.includes(v);
}
export function isChartType(v: unknown): v is ChartType {
  return typeof v === 'string' && CHART_TYPES.includes(v);
}
export function isTimeInterval(v: unknown): v is TimeInterval {
  return typeof v === 'number' && INTERVALS.includes(v);
}

export type Coin = {
  id: string;          // e.g. "bitcoin"
  symbol: string;
  name: string;
  platforms: Json | null;
  extraData: Json | null;
  lastUpdated: Date;
};

export type CoinPrice = {
  coinId: string;
  currency: string;
  price: number | null;
  marketCap: number | null;
  volume24h: number | null;
  priceChange24h: number | null;
  lastUpdated: Date;
};

export type OhlcCandle = {
  coinId: string;
  vsCurrency: string;
  interval: TimeInterval;
  ts: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
  marketCap: number | null;
};

export type TrendingCoin = {
  coinId: string;
  rank: number;
  score: number | null;
  marketCap: number | null;
  thumb: string | null;
  lastUpdated: Date;
};

export type User = {
  telegramId: string;
  username: string | null;
  userType: UserType;
  createdAt: Date;
  lastActive: Date;
  language: string;
  preferredChartType: string;
  preferredTimeframe: number;
};

export type NewUser = {
  telegramId: string;
  username?: string | null;
  userType?: UserType;
  language?: string;
  preferredChartType?: string;
  preferredTimeframe?: TimeInterval;
};

export type UserActivity = {
  userId: string;
  coinId: string;
  activityType: string;
  ts: number;          // epoch seconds
  details: Json | null;
};

export type Admin = {
  userId: string;
  role: AdminRole;
  createdAt: Date;
  createdBy: string | null;
  isActive: boolean;
};

export type NewAdmin = { userId: string; role: AdminRole; createdBy: string };

export type AdminActivity = {
  adminId: string;
  activityType: string;
  targetUserId: string | null;
  ts: Date;
  details: Json | null;
};
