import {
  BadGatewayException,
  GatewayTimeoutException,
  HttpException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { AxiosError, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import { UpstreamParseError } from '../common/errors/upstream-parse.error';
import { DASHBOARD_CONFIG, DashboardConfig } from '../config/dashboard.config';
import { buildBuilderHeaders } from './builder-auth';
import { BUILDER_HTTP_CLIENT } from './builder-http.client';
import { parseTradesPage } from './builder-trade.parser';
import { BuilderTrade, BuilderTradesPage } from './entities/builder-trade.entity';

export const BUILDER_TRADES_PATH = '/builder/trades';
export const INITIAL_CURSOR = 'MA==';
export const END_CURSOR = 'LTE=';

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

type PageAttempt =
  | { ok: true; page: BuilderTradesPage }
  | { ok: false; failure: HttpException; retryable: boolean };

// Read-only client for the builder trade history.
// Pages are fetched sequentially; any failure aborts the whole run.
@Injectable()
export class BuilderTradesClient {
  private readonly logger = new Logger(BuilderTradesClient.name);

  constructor(
    @Inject(BUILDER_HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(DASHBOARD_CONFIG) private readonly config: DashboardConfig,
  ) {}

  /**
   * Follows cursors until the end marker, an empty page or the page limit.
   * @throws BadGatewayException on upstream status or malformed payload
   * @throws GatewayTimeoutException when the upstream times out
   */
  async fetchAllTrades(): Promise<BuilderTrade[]> {
    const { maxPages } = this.config.upstream;
    const trades: BuilderTrade[] = [];
    let cursor = INITIAL_CURSOR;

    for (let page = 1; page <= maxPages; page++) {
      const result = await this.fetchPage(cursor);
      trades.push(...result.trades);

      const next = result.nextCursor;
      if (result.trades.length === 0 || !next || next === END_CURSOR) {
        this.logger.log(`Fetched ${trades.length} builder trades in ${page} page(s)`);
        return trades;
      }
      cursor = next;
    }

    this.logger.warn(`Stopped after ${maxPages} pages, ${trades.length} trades fetched; more are available`);
    return trades;
  }

  /** Fetches one signed page, retrying transient failures with exponential backoff */
  async fetchPage(cursor: string): Promise<BuilderTradesPage> {
    const { maxRetries, retryDelayMs } = this.config.upstream;

    for (let attempt = 0; ; attempt++) {
      const outcome = await this.requestPage(cursor);
      if (outcome.ok) {
        return outcome.page;
      }

      const { failure, retryable } = outcome;
      if (!retryable || attempt >= maxRetries) {
        this.logger.error(`Builder trades request failed: ${failure.message}`);
        throw failure;
      }

      const delay = retryDelayMs * 2 ** attempt;
      this.logger.warn(`${failure.message}; retry ${attempt + 1}/${maxRetries} in ${delay}ms`);
      await sleep(delay);
    }
  }

  private async requestPage(cursor: string): Promise<PageAttempt> {
    const headers = buildBuilderHeaders(this.config.credentials, {
      method: 'GET',
      path: BUILDER_TRADES_PATH,
    });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(BUILDER_TRADES_PATH, {
        params: { next_cursor: cursor },
        headers,
      });
    } catch (error) {
      if (!isAxiosError(error)) {
        throw error;
      }
      return { ok: false, failure: this.toNetworkFailure(error), retryable: true };
    }

    if (response.status < 200 || response.status >= 300) {
      return {
        ok: false,
        failure: new BadGatewayException(`Upstream API responded with status ${response.status}`),
        retryable: RETRYABLE_STATUSES.has(response.status),
      };
    }

    return { ok: true, page: this.parsePage(response.data) };
  }

  private parsePage(payload: unknown): BuilderTradesPage {
    try {
      return parseTradesPage(payload);
    } catch (error) {
      if (error instanceof UpstreamParseError) {
        this.logger.error(`Malformed builder trades page: ${error.message}`);
        throw new BadGatewayException(`Upstream API returned malformed trades: ${error.message}`);
      }
      throw error;
    }
  }

  private toNetworkFailure(error: AxiosError): HttpException {
    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return new GatewayTimeoutException(
        `Upstream API timed out after ${this.config.upstream.timeoutMs}ms`,
      );
    }
    return new BadGatewayException(`Upstream API request failed: ${error.message}`);
  }
}
