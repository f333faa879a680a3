/**
 * Tests for CloudWatch Metrics Utilities
 *
 * Tests metric emission for worksheet writes and roster events.
 */

import { mockClient } from 'aws-sdk-client-mock';
import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import {
  emitMetric,
  emitDuplicateWeekRejected,
  emitPlayerHardDeleted,
  measureSheetWrite,
  MetricName,
  MetricUnit,
} from '../../src/utils/metrics';

// Create CloudWatch mock
const cloudWatchMock = mockClient(CloudWatchClient);

describe('CloudWatch Metrics Utilities', () => {
  const originalEnabled = process.env.METRICS_ENABLED;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    cloudWatchMock.reset();
    process.env.METRICS_ENABLED = 'true';
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    if (originalEnabled === undefined) {
      delete process.env.METRICS_ENABLED;
    } else {
      process.env.METRICS_ENABLED = originalEnabled;
    }
  });

  describe('emitMetric', () => {
    it('should emit metric with correct parameters', async () => {
      cloudWatchMock.on(PutMetricDataCommand).resolves({});

      await emitMetric(MetricName.SHEET_WRITE_LATENCY, 150, MetricUnit.MILLISECONDS, {
        worksheet: 'seguimiento',
      });

      const calls = cloudWatchMock.commandCalls(PutMetricDataCommand);
      expect(calls.length).toBe(1);

      const command = calls[0].args[0].input;
      expect(command.Namespace).toBe('LoanTracker/Backend');
      expect(command.MetricData).toHaveLength(1);
      expect(command.MetricData?.[0]).toMatchObject({
        MetricName: 'SheetWriteLatency',
        Value: 150,
        Unit: 'Milliseconds',
        Dimensions: [{ Name: 'worksheet', Value: 'seguimiento' }],
      });
    });

    it('should emit metric without dimensions', async () => {
      cloudWatchMock.on(PutMetricDataCommand).resolves({});

      await emitMetric(MetricName.PLAYER_HARD_DELETED, 1, MetricUnit.COUNT);

      const command = cloudWatchMock.commandCalls(PutMetricDataCommand)[0].args[0].input;
      expect(command.MetricData?.[0].Dimensions).toBeUndefined();
    });

    it('should filter out undefined dimension values', async () => {
      cloudWatchMock.on(PutMetricDataCommand).resolves({});

      await emitMetric(MetricName.SHEET_WRITE_LATENCY, 50, MetricUnit.MILLISECONDS, {
        worksheet: 'jugadores',
        error: undefined,
      });

      const command = cloudWatchMock.commandCalls(PutMetricDataCommand)[0].args[0].input;
      expect(command.MetricData?.[0].Dimensions).toEqual([{ Name: 'worksheet', Value: 'jugadores' }]);
    });

    it('should send nothing when metrics are disabled', async () => {
      process.env.METRICS_ENABLED = 'false';

      await emitMetric(MetricName.PLAYER_HARD_DELETED, 1, MetricUnit.COUNT);

      expect(cloudWatchMock.commandCalls(PutMetricDataCommand)).toHaveLength(0);
    });

    it('should log and swallow CloudWatch failures', async () => {
      cloudWatchMock.on(PutMetricDataCommand).rejects(new Error('Throttled'));

      await expect(emitMetric(MetricName.PLAYER_HARD_DELETED, 1, MetricUnit.COUNT)).resolves.toBeUndefined();

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry).toMatchObject({
        level: 'ERROR',
        message: 'Failed to emit CloudWatch metric',
        metric_name: 'PlayerHardDeleted',
        error: 'Throttled',
      });
    });
  });

  describe('measureSheetWrite', () => {
    it('should return the result and emit the latency', async () => {
      cloudWatchMock.on(PutMetricDataCommand).resolves({});

      const result = await measureSheetWrite('reportes', async () => 'written');

      expect(result).toBe('written');
      const datum = cloudWatchMock.commandCalls(PutMetricDataCommand)[0].args[0].input.MetricData?.[0];
      expect(datum?.MetricName).toBe('SheetWriteLatency');
      expect(datum?.Dimensions).toEqual([{ Name: 'worksheet', Value: 'reportes' }]);
    });

    it('should flag failed writes and rethrow', async () => {
      cloudWatchMock.on(PutMetricDataCommand).resolves({});

      await expect(
        measureSheetWrite('reportes', async () => {
          throw new Error('quota exceeded');
        })
      ).rejects.toThrow('quota exceeded');

      const datum = cloudWatchMock.commandCalls(PutMetricDataCommand)[0].args[0].input.MetricData?.[0];
      expect(datum?.Dimensions).toEqual([
        { Name: 'worksheet', Value: 'reportes' },
        { Name: 'error', Value: 'true' },
      ]);
    });
  });

  describe('roster counters', () => {
    it('should count duplicate weeks and hard deletes', async () => {
      cloudWatchMock.on(PutMetricDataCommand).resolves({});

      await emitDuplicateWeekRejected();
      await emitPlayerHardDeleted();

      const data = cloudWatchMock
        .commandCalls(PutMetricDataCommand)
        .map((call) => call.args[0].input.MetricData?.[0]);
      expect(data.map((d) => [d?.MetricName, d?.Value, d?.Unit])).toEqual([
        ['DuplicateWeekRejected', 1, 'Count'],
        ['PlayerHardDeleted', 1, 'Count'],
      ]);
      expect(data[0]?.Dimensions).toEqual([{ Name: 'operation_type', Value: 'weekly_log' }]);
      expect(data[1]?.Dimensions).toEqual([{ Name: 'operation_type', Value: 'hard_delete' }]);
    });
  });
});
