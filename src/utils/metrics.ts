/**
 * CloudWatch Metrics Utilities
 *
 * Provides functions to emit custom CloudWatch metrics for the poll cycle:
 * cycle duration, matches processed and feed outages.
 */

import { CloudWatchClient, PutMetricDataCommand, MetricDatum } from '@aws-sdk/client-cloudwatch';
import { log, LogLevel } from './logger';

/**
 * CloudWatch client instance
 * Reused across Lambda invocations for connection pooling
 */
const cloudWatchClient = new CloudWatchClient({
  region: process.env.AWS_REGION || 'us-east-1',
});

/**
 * Namespace for custom metrics
 */
const METRIC_NAMESPACE = 'MomentumFC/Backend';

/**
 * Metric names
 */
export enum MetricName {
  POLL_CYCLE_DURATION = 'PollCycleDuration',
  MATCHES_PROCESSED = 'MatchesProcessed',
  FEED_UNAVAILABLE = 'FeedUnavailable',
}

/**
 * Metric units
 */
export enum MetricUnit {
  MILLISECONDS = 'Milliseconds',
  COUNT = 'Count',
}

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  status?: string;
  failure_kind?: string;
  [key: string]: string | undefined;
}

function metricsEnabled(): boolean {
  return process.env.METRICS_ENABLED !== 'false';
}

/**
 * Emit a custom CloudWatch metric
 *
 * @param metricName - Name of the metric
 * @param value - Metric value
 * @param unit - Metric unit (Milliseconds, Count, etc.)
 * @param dimensions - Optional dimensions for filtering
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  if (!metricsEnabled()) {
    return;
  }

  try {
    const metricData: MetricDatum = {
      MetricName: metricName,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
    };

    if (dimensions) {
      metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
    }

    const command = new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    });

    await cloudWatchClient.send(command);
  } catch (error) {
    // Metrics must not break the poll cycle
    log(LogLevel.ERROR, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      dimensions,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Emit poll cycle duration, tagged with the resulting feed status
 */
export async function emitPollCycleDuration(
  status: string,
  durationMs: number
): Promise<void> {
  await emitMetric(
    MetricName.POLL_CYCLE_DURATION,
    durationMs,
    MetricUnit.MILLISECONDS,
    { status }
  );
}

/**
 * Emit the number of matches persisted by one cycle
 */
export async function emitMatchesProcessed(count: number): Promise<void> {
  await emitMetric(MetricName.MATCHES_PROCESSED, count, MetricUnit.COUNT);
}

/**
 * Emit one feed outage (non-2xx response or connection failure)
 */
export async function emitFeedUnavailable(failureKind: 'http' | 'network'): Promise<void> {
  await emitMetric(
    MetricName.FEED_UNAVAILABLE,
    1,
    MetricUnit.COUNT,
    { failure_kind: failureKind }
  );
}
