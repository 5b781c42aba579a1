/**
 * HTTP client for the content subsystem's metrics endpoint.
 *
 * GET {baseUrl}/content/{contentId}/metrics
 *   -> { word_count, letter_count, reading_level }
 */

import { NotFoundError } from '../lib/errors';
import { contentMetricsSchema, parseOrThrow } from '../lib/validators';
import { quizLogger } from '../logger';
import type { ContentMetrics } from '../types';
import type { ContentMetricsProvider } from './QuizAttemptService';

export class HttpContentMetricsProvider implements ContentMetricsProvider {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async getMetrics(contentId: string): Promise<ContentMetrics> {
    const url = `${this.baseUrl.replace(/\/$/, '')}/content/${encodeURIComponent(contentId)}/metrics`;

    try {
      const response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });

      if (response.status === 404) {
        throw new NotFoundError(`Content with id '${contentId}' not found`);
      }
      if (!response.ok) {
        throw new Error(`Content metrics request failed: ${response.status} ${response.statusText}`);
      }

      const body: unknown = await response.json();
      return parseOrThrow(contentMetricsSchema, body, 'content metrics');
    } catch (error) {
      quizLogger.error({ err: error, contentId }, 'Failed to fetch content metrics');
      throw error;
    }
  }
}
