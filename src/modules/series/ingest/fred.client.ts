/**
 * FRED CLIENT
 *
 * Client for the Federal Reserve Economic Data (FRED) observations endpoint.
 * Requests go through a per-minute Bottleneck reservoir and are retried on
 * network errors, 429 and 5xx.
 */

import axios from 'axios';
import Bottleneck from 'bottleneck';
import { FredFetchError, errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import type { FredSourceConfig } from '../../../config/monitor.config.js';
import type { SeriesPoint } from '../contracts/series.contracts.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface FredObservation {
  date: string;
  value: string;
}

export interface FredSeriesResponse {
  observation_start?: string;
  observation_end?: string;
  count?: number;
  observations?: FredObservation[];
}

export interface FredClientOptions {
  apiKey: string;
  source: FredSourceConfig;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Converts raw observations to points. FRED uses "." for missing values;
 * anything non-numeric is treated the same way.
 */
export function parseObservations(observations: FredObservation[]): SeriesPoint[] {
  const points: SeriesPoint[] = [];

  for (const obs of observations) {
    if (obs.value === '.' || obs.value.trim() === '') continue;

    const value = Number(obs.value);
    if (!Number.isFinite(value)) continue;

    points.push({ date: obs.date, value });
  }

  return points;
}

function isRetryable(status: number | undefined): boolean {
  return status === undefined || status === 429 || status >= 500;
}

// ═══════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════

export class FredClient {
  private readonly limiter: Bottleneck;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: FredClientOptions) {
    const { requestsPerMinute } = options.source.rateLimit;
    this.logger = options.logger ?? noopLogger;
    this.sleep = options.sleep ?? defaultSleep;

    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      reservoir: requestsPerMinute,
      reservoirRefreshAmount: requestsPerMinute,
      reservoirRefreshInterval: 60_000,
    });

    this.limiter.on('depleted', () => {
      this.logger.warn({ requestsPerMinute }, '[FRED] Rate limit reached, waiting for reservoir refresh');
    });
  }

  hasApiKey(): boolean {
    return this.options.apiKey.length > 0;
  }

  /**
   * Observations for one series, ascending by date.
   * Throws FredFetchError once retries are exhausted.
   */
  async fetchSeries(seriesId: string, startDate?: string, endDate?: string): Promise<SeriesPoint[]> {
    if (!this.hasApiKey()) {
      throw new FredFetchError(seriesId, `API key not configured (set ${this.options.source.apiKeyEnv})`);
    }

    const { baseUrl, timeoutMs, rateLimit } = this.options.source;
    const params: Record<string, string> = {
      series_id: seriesId,
      api_key: this.options.apiKey,
      file_type: 'json',
      sort_order: 'asc',
    };
    if (startDate) params.observation_start = startDate;
    if (endDate) params.observation_end = endDate;

    let lastError: unknown;
    let lastStatus: number | undefined;

    for (let attempt = 0; attempt <= rateLimit.maxRetries; attempt++) {
      try {
        const response = await this.limiter.schedule(() =>
          axios.get<FredSeriesResponse>(`${baseUrl}/series/observations`, { params, timeout: timeoutMs })
        );
        return parseObservations(response.data.observations ?? []);
      } catch (err) {
        lastError = err;
        lastStatus = axios.isAxiosError(err) ? err.response?.status : undefined;

        if (attempt === rateLimit.maxRetries || !isRetryable(lastStatus)) break;

        this.logger.warn(
          { seriesId, attempt: attempt + 1, status: lastStatus, error: errorMessage(err) },
          '[FRED] Request failed, retrying'
        );
        await this.sleep(rateLimit.retryDelaySeconds * 1000);
      }
    }

    this.logger.error({ seriesId, status: lastStatus, error: errorMessage(lastError) }, '[FRED] Fetch failed');
    throw new FredFetchError(seriesId, errorMessage(lastError), lastStatus);
  }

  /**
   * Connectivity check against a short window of a well-known series.
   */
  async checkHealth(): Promise<{ ok: boolean; message: string }> {
    if (!this.hasApiKey()) {
      return { ok: false, message: `FRED API key not configured (set ${this.options.source.apiKeyEnv})` };
    }

    try {
      const points = await this.fetchSeries('EFFR', '2024-01-01', '2024-01-31');
      return { ok: points.length > 0, message: `FRED API accessible, got ${points.length} points` };
    } catch (err) {
      return { ok: false, message: `FRED API error: ${errorMessage(err)}` };
    }
  }

  async close(): Promise<void> {
    await this.limiter.disconnect();
  }
}
