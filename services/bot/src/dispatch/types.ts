import type { Coin, User } from '../types/domain.js';

type EventBase = {
  conversationId: string; // chat id; session state and ordering are keyed on it
  identity: string;       // stable platform identity of the sender
  username?: string | null;
};

export type InboundEvent =
  | (EventBase & { kind: 'command'; command: string; args: string[] })
  | (EventBase & { kind: 'message'; text: string });

export type MenuKind = 'main' | 'admin';

export type Reply =
  | { kind: 'menu'; menu: MenuKind; text: string }
  | { kind: 'text'; text: string }
  | { kind: 'denied'; reason: 'banned' | 'not_authorized'; text: string }
  | { kind: 'error'; text: string };

export const ANALYSIS_FEATURES = ['analyze', 'quick', 'news', 'chart'] as const;
export type AnalysisFeature = (typeof ANALYSIS_FEATURES)[number];

export function isAnalysisFeature(v: string): v is AnalysisFeature {
  return (ANALYSIS_FEATURES as readonly string[]).includes(v);
}

/** The report generator behind the analysis commands. */
export interface AnalysisPort {
  run(feature: AnalysisFeature, coin: Coin, user: User): Promise<string>;
}

export type SessionState = { awaiting: 'coin'; feature: AnalysisFeature };
