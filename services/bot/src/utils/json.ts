import type { Json } from '../types/domain.js';

// jsonb params go over the wire as text; pg would turn a bare JS array into a PG array literal
export function jsonParam(value: Json | null | undefined): string | null {
  return value === undefined || value === null ? null : JSON.stringify(value);
}
