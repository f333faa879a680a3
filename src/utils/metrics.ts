/**
 * CloudWatch Metrics Utilities
 *
 * Emits custom CloudWatch metrics for spreadsheet writes and roster events.
 * Nothing is sent unless METRICS_ENABLED=true.
 */

import { CloudWatchClient, PutMetricDataCommand, MetricDatum } from '@aws-sdk/client-cloudwatch';
import { LogLevel, log } from './logger';

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
const METRIC_NAMESPACE = 'LoanTracker/Backend';

/**
 * Metric names
 */
export enum MetricName {
  SHEET_WRITE_LATENCY = 'SheetWriteLatency',
  DUPLICATE_WEEK_REJECTED = 'DuplicateWeekRejected',
  PLAYER_HARD_DELETED = 'PlayerHardDeleted',
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
export type MetricDimensions = Record<string, string | undefined>;

export function isMetricsEnabled(): boolean {
  return process.env.METRICS_ENABLED === 'true';
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
  if (!isMetricsEnabled()) {
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

    await cloudWatchClient.send(new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    }));
  } catch (error) {
    // metrics must not break the request
    log(LogLevel.ERROR, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Measure an async worksheet write and emit its latency
 *
 * @param worksheet - Worksheet being written
 * @param operation - Write to measure
 * @returns Result of the operation
 */
export async function measureSheetWrite<T>(
  worksheet: string,
  operation: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await operation();
    await emitMetric(MetricName.SHEET_WRITE_LATENCY, Date.now() - startTime, MetricUnit.MILLISECONDS, {
      worksheet,
    });
    return result;
  } catch (error) {
    // failed writes are still timed
    await emitMetric(MetricName.SHEET_WRITE_LATENCY, Date.now() - startTime, MetricUnit.MILLISECONDS, {
      worksheet,
      error: 'true',
    });
    throw error;
  }
}

/**
 * Count a weekly entry rejected because the week was already logged
 */
export async function emitDuplicateWeekRejected(): Promise<void> {
  await emitMetric(MetricName.DUPLICATE_WEEK_REJECTED, 1, MetricUnit.COUNT, {
    operation_type: 'weekly_log',
  });
}

/**
 * Count a cascading player deletion
 */
export async function emitPlayerHardDeleted(): Promise<void> {
  await emitMetric(MetricName.PLAYER_HARD_DELETED, 1, MetricUnit.COUNT, {
    operation_type: 'hard_delete',
  });
}
