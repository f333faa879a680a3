/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * LOG_LEVEL and METRICS_ENABLED are read directly by the logger and metrics
 * modules.
 */

import { ConfigurationError } from '../models/errors';
import { WeekConvention } from '../utils/week-window';

export interface EnvironmentConfig {
  // Spreadsheet configuration
  spreadsheetName: string;
  spreadsheetId: string;

  // Service account credential: inline JSON or a Secrets Manager secret
  serviceAccountJson: string;
  serviceAccountSecretArn: string;

  // Application configuration
  weekConvention: WeekConvention;
  cacheTtlSeconds: number;
  awsRegion: string;
}

function parseWeekConvention(value: string | undefined): WeekConvention {
  return value?.trim().toLowerCase() === 'sunday' ? 'sunday' : 'monday';
}

function parseCacheTtl(value: string | undefined): number {
  const parsed = parseInt(value || '30', 10);
  return Number.isNaN(parsed) || parsed < 0 ? 30 : parsed;
}

/**
 * Load environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    spreadsheetName: process.env.SPREADSHEET_NAME || '',
    spreadsheetId: process.env.SPREADSHEET_ID || '',
    serviceAccountJson: process.env.GOOGLE_SERVICE_ACCOUNT_JSON || '',
    serviceAccountSecretArn: process.env.GOOGLE_SERVICE_ACCOUNT_SECRET_ARN || '',
    weekConvention: parseWeekConvention(process.env.WEEK_CONVENTION),
    cacheTtlSeconds: parseCacheTtl(process.env.CACHE_TTL_SECONDS),
    awsRegion: process.env.AWS_REGION || 'us-east-1',
  };
}

/**
 * Validate that all required settings are present
 *
 * @throws ConfigurationError naming every missing setting
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const missing: string[] = [];

  if (!config.spreadsheetName && !config.spreadsheetId) {
    missing.push('SPREADSHEET_NAME');
  }

  if (!config.serviceAccountJson && !config.serviceAccountSecretArn) {
    missing.push('GOOGLE_SERVICE_ACCOUNT_JSON (or GOOGLE_SERVICE_ACCOUNT_SECRET_ARN)');
  }

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required configuration: ${missing.join(', ')}`,
      missing
    );
  }
}
