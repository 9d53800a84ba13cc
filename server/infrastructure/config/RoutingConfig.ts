/**
 * RoutingConfig - Route search and simulation limits
 *
 * Bounds on the route search (hops, candidates, arena size) and the pricing
 * tolerances.
 */

import { safeParseFloat, safeParseInt } from "./env";

export const routingConfig = {
  // === Route search ===
  DEFAULT_MAX_HOPS: safeParseInt(process.env.DEFAULT_MAX_HOPS, 3),
  MAX_HOPS_LIMIT: 4, // Hard ceiling accepted from callers
  MAX_ROUTE_CANDIDATES: safeParseInt(process.env.MAX_ROUTE_CANDIDATES, 8),
  MAX_FRONTIER_NODES: safeParseInt(process.env.MAX_FRONTIER_NODES, 5000),

  // === Simulation ===
  RESERVE_FLOOR_BPS: safeParseInt(process.env.RESERVE_FLOOR_BPS, 0), // Minimum share of the output reserve a hop must leave behind

  // === Quote ===
  ORACLE_MAX_DEVIATION: safeParseFloat(process.env.ORACLE_MAX_DEVIATION, 0.05), // 5%
} as const;

export type RoutingConfig = typeof routingConfig;
