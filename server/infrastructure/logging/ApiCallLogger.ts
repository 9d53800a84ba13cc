/**
 * ApiCallLogger - Per-endpoint call log
 *
 * Keeps the most recent calls in a bounded in-memory ring and aggregates
 * success/failure counts and durations per endpoint. Served by
 * /api/logs/status and /api/logs/recent.
 */

export interface ApiCallLogEntry {
  service: string;
  endpoint: string;
  success: boolean;
  durationMs: number;
  timestamp: number;
  errorCode?: string;
  details?: Record<string, unknown>;
}

export interface EndpointStats {
  calls: number;
  failures: number;
  totalDurationMs: number;
  averageDurationMs: number;
}

const DEFAULT_MAX_ENTRIES = 500;

export class ApiCallLogger {
  private entries: ApiCallLogEntry[] = [];
  private stats: Map<string, EndpointStats> = new Map();

  constructor(private readonly maxEntries: number = DEFAULT_MAX_ENTRIES) {}

  public logSuccess(
    service: string,
    endpoint: string,
    durationMs: number,
    details?: Record<string, unknown>
  ): void {
    this.record({ service, endpoint, success: true, durationMs, timestamp: Date.now(), details });
  }

  public logError(
    service: string,
    endpoint: string,
    durationMs: number,
    errorCode: string,
    details?: Record<string, unknown>
  ): void {
    this.record({ service, endpoint, success: false, durationMs, timestamp: Date.now(), errorCode, details });
    console.warn(`⚠️ [API] ${service} ${endpoint} failed with ${errorCode} after ${durationMs}ms`);
  }

  public getStats(): { totalCalls: number; totalFailures: number; endpoints: Record<string, EndpointStats> } {
    const endpoints: Record<string, EndpointStats> = {};
    let totalCalls = 0;
    let totalFailures = 0;

    this.stats.forEach((value, key) => {
      endpoints[key] = { ...value };
      totalCalls += value.calls;
      totalFailures += value.failures;
    });

    return { totalCalls, totalFailures, endpoints };
  }

  /**
   * Most recent entries, newest first.
   */
  public getRecentLogs(count: number = 50): ApiCallLogEntry[] {
    const n = Math.max(0, Math.floor(count));
    if (n === 0) return [];
    return this.entries.slice(-n).reverse();
  }

  public reset(): void {
    this.entries = [];
    this.stats.clear();
  }

  private record(entry: ApiCallLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    const key = `${entry.service} ${entry.endpoint}`;
    const current = this.stats.get(key) ?? { calls: 0, failures: 0, totalDurationMs: 0, averageDurationMs: 0 };
    current.calls++;
    if (!entry.success) current.failures++;
    current.totalDurationMs += entry.durationMs;
    current.averageDurationMs = Math.round(current.totalDurationMs / current.calls);
    this.stats.set(key, current);
  }
}

let instance: ApiCallLogger | null = null;

export function getApiCallLogger(): ApiCallLogger {
  if (!instance) {
    instance = new ApiCallLogger();
  }
  return instance;
}
