import type { PoolView } from './PoolRegistry';
import {
  LiquidityPool,
  Route,
  Token,
  describeToken,
  orientPool,
  sameToken,
} from '../../domain/types';
import { NoRouteFoundError } from '../../domain/errors';
import { routingConfig } from '../../infrastructure/config/RoutingConfig';

export interface RouteSearchOptions {
  maxHops?: number;
  maxCandidates?: number;
  maxFrontierNodes?: number;
}

/**
 * One entry of the search arena. Paths are never copied: a node points at its
 * parent, and a route is rebuilt by walking parent links back to the source.
 */
interface FrontierNode {
  token: Token;
  pool: LiquidityPool | null; // null for the source node
  parent: number;
  depth: number;
}

interface RankedRoute {
  route: Route;
  depth: number;
  totalFeeBps: number;
  key: string;
}

export class RouteFinder {
  /**
   * Enumerates candidate routes from `source` to `destination` with a
   * breadth-first walk of the token graph (tokens are nodes, pools are edges).
   *
   * Candidates are ranked by a cheap liquidity-depth heuristic, never by
   * simulated output. Direct single-hop routes always come first.
   *
   * @throws NoRouteFoundError when the destination is unreachable within maxHops
   */
  public findRoutes(
    source: Token,
    destination: Token,
    view: PoolView,
    options: RouteSearchOptions = {}
  ): Route[] {
    const maxHops = Math.max(1, options.maxHops ?? routingConfig.DEFAULT_MAX_HOPS);
    const maxCandidates = Math.max(1, options.maxCandidates ?? routingConfig.MAX_ROUTE_CANDIDATES);
    const maxFrontierNodes = Math.max(2, options.maxFrontierNodes ?? routingConfig.MAX_FRONTIER_NODES);

    if (sameToken(source, destination)) {
      throw new NoRouteFoundError(source.address, destination.address, maxHops);
    }

    const arena: FrontierNode[] = [{ token: source, pool: null, parent: -1, depth: 0 }];
    const terminals: number[] = [];
    let truncated = false;

    for (let head = 0; head < arena.length && !truncated; head++) {
      const node = arena[head];
      if (node.depth >= maxHops || sameToken(node.token, destination)) continue;

      for (const pool of view.getPoolsForToken(node.token)) {
        const { tokenOut } = orientPool(pool, node.token);
        if (this.pathContains(arena, head, tokenOut)) continue;

        if (arena.length >= maxFrontierNodes) {
          truncated = true;
          break;
        }

        arena.push({ token: tokenOut, pool, parent: head, depth: node.depth + 1 });
        if (sameToken(tokenOut, destination)) {
          terminals.push(arena.length - 1);
        }
      }
    }

    if (truncated) {
      console.warn(`⚠️ [ROUTER] Search arena capped at ${maxFrontierNodes} nodes for ${describeToken(source)} -> ${describeToken(destination)}`);
    }

    if (terminals.length === 0) {
      throw new NoRouteFoundError(source.address, destination.address, maxHops);
    }

    const ranked = terminals
      .map(index => this.rank(this.buildRoute(arena, index)))
      .sort((a, b) => this.compare(a, b));

    return ranked.slice(0, maxCandidates).map(r => r.route);
  }

  private pathContains(arena: FrontierNode[], index: number, token: Token): boolean {
    for (let i = index; i !== -1; i = arena[i].parent) {
      if (sameToken(arena[i].token, token)) return true;
    }
    return false;
  }

  private buildRoute(arena: FrontierNode[], terminal: number): Route {
    const tokens: Token[] = [];
    const pools: LiquidityPool[] = [];
    for (let i = terminal; i !== -1; i = arena[i].parent) {
      const node = arena[i];
      tokens.push(node.token);
      if (node.pool) pools.push(node.pool);
    }
    return { tokens: tokens.reverse(), pools: pools.reverse() };
  }

  /**
   * Route depth = the shallowest hop, each hop measured as the geometric mean
   * of its two reserves in whole-token units.
   */
  private rank(route: Route): RankedRoute {
    let depth = Number.POSITIVE_INFINITY;
    let totalFeeBps = 0;

    route.pools.forEach((pool, i) => {
      const { reserveIn, reserveOut, tokenOut } = orientPool(pool, route.tokens[i]);
      const wholeIn = Number(reserveIn) / 10 ** route.tokens[i].decimals;
      const wholeOut = Number(reserveOut) / 10 ** tokenOut.decimals;
      depth = Math.min(depth, Math.sqrt(wholeIn) * Math.sqrt(wholeOut));
      totalFeeBps += pool.feeBps;
    });

    return {
      route,
      depth,
      totalFeeBps,
      key: route.pools.map(p => p.address.toLowerCase()).join('>'),
    };
  }

  private compare(a: RankedRoute, b: RankedRoute): number {
    const aDirect = a.route.pools.length === 1 ? 0 : 1;
    const bDirect = b.route.pools.length === 1 ? 0 : 1;
    if (aDirect !== bDirect) return aDirect - bDirect;
    if (a.depth !== b.depth) return b.depth - a.depth;
    if (a.route.pools.length !== b.route.pools.length) return a.route.pools.length - b.route.pools.length;
    if (a.totalFeeBps !== b.totalFeeBps) return a.totalFeeBps - b.totalFeeBps;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  }
}
