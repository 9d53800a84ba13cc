/**
 * TimingConfig - Centralized configuration for all timing constants
 *
 * All time-based constants used by the quote engine are defined here.
 * Each value can be overridden from the environment (see .env.example).
 *
 * TIMING HIERARCHY:
 * - Quote deadline: 4s end-to-end per request (refreshes + simulation + balance)
 * - Staleness threshold: 15s before a pool must be re-fetched for a quote
 * - Background refresh: 12s between discovery/refresh cycles of watched pairs
 * - Eviction: pool dropped after 3 consecutive cycles without being listed
 */

import { safeParseInt } from "./env";

export const timingConfig = {
  // === Quote requests ===
  QUOTE_DEADLINE_MS: safeParseInt(process.env.QUOTE_DEADLINE_MS, 4000),
  STALENESS_THRESHOLD_MS: safeParseInt(process.env.STALENESS_THRESHOLD_MS, 15 * 1000),

  // === Pool lifecycle ===
  POOL_REFRESH_INTERVAL_MS: safeParseInt(process.env.POOL_REFRESH_INTERVAL_MS, 12 * 1000),
  POOL_EVICTION_MISSED_CYCLES: safeParseInt(process.env.POOL_EVICTION_MISSED_CYCLES, 3),

  // === Collaborators ===
  PRICE_ORACLE_TIMEOUT_MS: safeParseInt(process.env.PRICE_ORACLE_TIMEOUT_MS, 5000),
} as const;

export type TimingConfig = typeof timingConfig;
