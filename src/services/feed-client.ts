/**
 * Football Data Feed Client
 * 
 * Thin axios wrapper over the football-data.org v4 /matches endpoint.
 * Non-2xx responses and transport failures are returned as values so the
 * poll cycle can record a status; this client never throws.
 */

import axios, { AxiosInstance } from 'axios';
import { FeedFetchResult } from '../models/feed';
import { MatchStatus } from '../models/match';

export const UPCOMING_WINDOW_DAYS = 7;

export interface MatchFeed {
  fetchLiveMatches(): Promise<FeedFetchResult>;
  fetchUpcomingMatches(now?: Date): Promise<FeedFetchResult>;
}

export interface FeedClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  competitionIds: number[];
}

type FeedHttpClient = Pick<AxiosInstance, 'get'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractMatches(body: unknown): unknown[] {
  if (isRecord(body) && Array.isArray(body.matches)) {
    return body.matches;
  }
  return [];
}

function extractMessage(body: unknown): string {
  if (isRecord(body) && typeof body.message === 'string' && body.message) {
    return body.message;
  }
  return 'Unknown';
}

/**
 * YYYY-MM-DD in UTC
 */
export function formatFeedDate(date: Date): string {
  return date.toISOString().substring(0, 10);
}

export function createFeedHttpClient(options: FeedClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    headers: {
      'X-Auth-Token': options.apiKey,
      Accept: 'application/json',
    },
    timeout: options.timeoutMs,
    // Status codes are inspected by the caller
    validateStatus: () => true,
  });
}

export class FootballDataClient implements MatchFeed {
  private http: FeedHttpClient;

  constructor(private options: FeedClientOptions, http?: FeedHttpClient) {
    this.http = http ?? createFeedHttpClient(options);
  }

  /**
   * Matches currently LIVE in the allow-listed competitions
   */
  async fetchLiveMatches(): Promise<FeedFetchResult> {
    return this.fetchMatches({
      status: MatchStatus.LIVE,
      competitions: this.options.competitionIds.join(','),
    });
  }

  /**
   * Matches SCHEDULED from today until seven days out
   */
  async fetchUpcomingMatches(now: Date = new Date()): Promise<FeedFetchResult> {
    const until = new Date(now.getTime() + UPCOMING_WINDOW_DAYS * 24 * 60 * 60 * 1000);
    return this.fetchMatches({
      dateFrom: formatFeedDate(now),
      dateTo: formatFeedDate(until),
      status: MatchStatus.SCHEDULED,
      competitions: this.options.competitionIds.join(','),
    });
  }

  private async fetchMatches(params: Record<string, string>): Promise<FeedFetchResult> {
    try {
      const response = await this.http.get<unknown>('/matches', { params });

      if (response.status < 200 || response.status >= 300) {
        return {
          ok: false,
          kind: 'http',
          statusCode: response.status,
          message: extractMessage(response.data),
        };
      }

      return { ok: true, matches: extractMatches(response.data) };
    } catch (error) {
      return {
        ok: false,
        kind: 'network',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
