import { Registry, collectDefaultMetrics, Counter } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const botCommands = new Counter({
  name: 'bot_commands_total',
  help: 'Dispatched commands and messages by outcome',
  labelNames: ['command', 'outcome'] as const,
  registers: [registry],
});

export const activityWriteFailures = new Counter({
  name: 'bot_activity_write_failures_total',
  help: 'Fire-and-forget activity writes that failed',
  registers: [registry],
});
