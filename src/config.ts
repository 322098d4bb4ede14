/* src/config.ts
   Centralized engine configuration */
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const positiveInt = (name: string, fallback: number) => {
  const parsed = Number(env(name));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const list = (name: string, fallback: string) =>
  env(name, fallback)
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);

export const config = {
  // ── Logging ──────────────────────────────────────────────────────
  log: {
    level: env('LOG_LEVEL', 'info'),
    pretty: env('LOG_PRETTY') === 'true',
  },

  // ── Graph traversal & identifiers ────────────────────────────────
  graph: {
    maxDepth: positiveInt('GRAPH_MAX_DEPTH', 64),
    idLength: positiveInt('GRAPH_ID_LENGTH', 10),
  },

  // ── Cascade defaults (real-estate schema) ────────────────────────
  cascade: {
    placeholderTenantPrefix: env('PLACEHOLDER_TENANT_PREFIX', 'Tenant_'),
    numericFields: list('NUMERIC_FIELDS', 'rentAmount,securityDeposit'),
  },
} as const;
