import { InvalidCriteriaError } from '../shared/errors.js';
import type {
  DayBucket,
  Distributions,
  FlagCounts,
  FlaggedRecord,
  MetricsSummary,
} from '../types/metricsTypes.js';
import type {
  DateRange,
  DateRangeKey,
  FilterCriteria,
  JoinedRecord,
} from '../types/recordTypes.js';
import { DAY_MS, resolveDateRange, seriesWindowDays } from '../utils/dateRange.js';
import { SupabaseDataGateway, type DataGateway } from './dataGateway.js';
import {
  assertValidThreshold,
  classifyBatch,
  classifyEvaluation,
  emptyFlagCounts,
} from './flagClassifier.js';
import { innerJoinRecords, joinAndFilter, joinRecords } from './joinFilter.js';
import { distributions, summarize } from './metricsAggregator.js';
import { dailySeries } from './timeSeries.js';

export const MAX_PAGE_SIZE = 100;

export interface MessagePage {
  page: number;
  limit: number;
  records: JoinedRecord[];
}

export interface FlaggedView {
  threshold: number;
  records: FlaggedRecord[];
  counts: FlagCounts;
}

export interface MetricsOverview {
  summary: MetricsSummary;
  daily: DayBucket[];
  distributions: Distributions;
}

function assertPositiveInteger(name: string, value: number, max?: number): void {
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const bound = max === undefined ? '' : ` and at most ${max}`;
    throw new InvalidCriteriaError(`${name} must be a positive integer${bound}, got ${value}`);
  }
}

export class DashboardService {
  constructor(
    private readonly gateway: DataGateway = new SupabaseDataGateway(),
    private readonly clock: () => Date = () => new Date()
  ) {}

  // Phase 1 reads messages, phase 2 their evaluations
  private async loadJoined(range: DateRange): Promise<JoinedRecord[]> {
    const messages = await this.gateway.fetchMessages(range);
    const evaluations = await this.gateway.fetchEvaluations(messages.map((message) => message.id));
    return joinRecords(messages, evaluations);
  }

  // "All time" charts still only cover the series window
  private seriesRange(rangeKey: DateRangeKey, now: Date): DateRange {
    const range = resolveDateRange(rangeKey, now);
    if (range.start) return range;

    return {
      start: new Date(now.getTime() - seriesWindowDays(rangeKey) * DAY_MS),
      end: range.end,
    };
  }

  async getMetricsSummary(rangeKey: DateRangeKey): Promise<MetricsSummary> {
    try {
      const now = this.clock();
      const records = await this.loadJoined(resolveDateRange(rangeKey, now));
      return summarize(records, now);
    } catch (error) {
      console.error('Error getting metrics summary:', error);
      throw error;
    }
  }

  async getDailyMetrics(rangeKey: DateRangeKey): Promise<DayBucket[]> {
    try {
      const now = this.clock();
      const records = await this.loadJoined(this.seriesRange(rangeKey, now));
      return dailySeries(records, seriesWindowDays(rangeKey), now);
    } catch (error) {
      console.error('Error getting daily metrics:', error);
      throw error;
    }
  }

  async getDistributions(rangeKey: DateRangeKey): Promise<Distributions> {
    try {
      const records = await this.loadJoined(resolveDateRange(rangeKey, this.clock()));
      return distributions(records);
    } catch (error) {
      console.error('Error getting distributions:', error);
      throw error;
    }
  }

  // Everything the metrics view needs from a single read
  async getMetricsOverview(rangeKey: DateRangeKey): Promise<MetricsOverview> {
    try {
      const now = this.clock();
      const records = await this.loadJoined(resolveDateRange(rangeKey, now));

      return {
        summary: summarize(records, now),
        daily: dailySeries(records, seriesWindowDays(rangeKey), now),
        distributions: distributions(records),
      };
    } catch (error) {
      console.error('Error getting metrics overview:', error);
      throw error;
    }
  }

  // Filters run on the fetched page, so a page can come back short
  async browseMessages(
    rangeKey: DateRangeKey,
    criteria: FilterCriteria,
    page: number,
    pageSize: number
  ): Promise<MessagePage> {
    assertPositiveInteger('page', page);
    assertPositiveInteger('limit', pageSize, MAX_PAGE_SIZE);

    try {
      const range = resolveDateRange(rangeKey, this.clock());
      const messages = await this.gateway.fetchMessages(range, {
        limit: pageSize,
        offset: (page - 1) * pageSize,
      });
      const evaluations = await this.gateway.fetchEvaluations(messages.map((message) => message.id));

      return {
        page,
        limit: pageSize,
        records: joinAndFilter(messages, evaluations, criteria),
      };
    } catch (error) {
      console.error('Error browsing messages:', error);
      throw error;
    }
  }

  /**
   * Flagged responses, newest first.
   *
   * The store cannot express the OR of the flag rules, so every evaluation is
   * read and classified here first; only the messages behind flagged
   * evaluations are then fetched, inside the date range.
   */
  async getFlaggedMessages(
    rangeKey: DateRangeKey,
    threshold: number,
    limit: number
  ): Promise<FlaggedView> {
    assertValidThreshold(threshold);
    assertPositiveInteger('limit', limit);

    try {
      const evaluations = await this.gateway.fetchAllEvaluations();
      const candidates = evaluations.filter(
        (evaluation) => classifyEvaluation(evaluation, threshold).flagged
      );

      if (candidates.length === 0) {
        return { threshold, records: [], counts: emptyFlagCounts() };
      }

      const messages = await this.gateway.fetchMessagesByIds(
        candidates.map((evaluation) => evaluation.message_id),
        resolveDateRange(rangeKey, this.clock()),
        limit
      );
      const { flagged, counts } = classifyBatch(innerJoinRecords(messages, candidates), threshold);

      return { threshold, records: flagged, counts };
    } catch (error) {
      console.error('Error getting flagged messages:', error);
      throw error;
    }
  }
}
