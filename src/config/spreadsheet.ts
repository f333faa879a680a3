/**
 * Spreadsheet Connection Module
 *
 * Opens the Google spreadsheet that stores every table. The connection is
 * built once at startup (openSpreadsheet) and handed to the TableStore;
 * nothing here is cached at module level.
 *
 * The service account credential comes from GOOGLE_SERVICE_ACCOUNT_JSON or,
 * when that is empty, from the Secrets Manager secret named by
 * GOOGLE_SERVICE_ACCOUNT_SECRET_ARN.
 */

import { google, drive_v3, sheets_v4 } from 'googleapis';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { EnvironmentConfig } from './environment';
import { ConfigurationError, SpreadsheetConnectionError } from '../models/errors';
import { TableValues } from '../models/table';
import { logSpreadsheet } from '../utils/logger';

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

/**
 * Minimal worksheet operations the table store needs
 */
export interface SheetClient {
  listWorksheets(): Promise<string[]>;
  readValues(title: string): Promise<TableValues>;
  addWorksheet(title: string, rowCount: number, columnCount: number): Promise<void>;
  overwriteValues(title: string, values: TableValues): Promise<void>;
}

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

/**
 * A1 notation for a whole worksheet
 */
function sheetRange(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Google Sheets implementation of SheetClient
 */
export class GoogleSheetsClient implements SheetClient {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    readonly spreadsheetId: string
  ) {}

  async listWorksheets(): Promise<string[]> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties.title',
    });

    return (response.data.sheets ?? []).flatMap((sheet) =>
      sheet.properties?.title ? [sheet.properties.title] : []
    );
  }

  async readValues(title: string): Promise<TableValues> {
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: sheetRange(title),
    });

    return (response.data.values ?? []).map((row) => row.map((cell) => String(cell ?? '')));
  }

  async addWorksheet(title: string, rowCount: number, columnCount: number): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            addSheet: {
              properties: {
                title,
                gridProperties: { rowCount, columnCount },
              },
            },
          },
        ],
      },
    });
  }

  /**
   * Clear the worksheet, then write every row starting at A1
   */
  async overwriteValues(title: string, values: TableValues): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range: sheetRange(title),
    });

    if (values.length === 0) {
      return;
    }

    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${sheetRange(title)}!A1`,
      valueInputOption: 'RAW',
      insertDataOption: 'OVERWRITE',
      requestBody: { values },
    });
  }
}

/**
 * Parse a service account JSON document
 *
 * @param json - Raw JSON text
 * @param setting - Setting the JSON came from, named in errors
 * @throws ConfigurationError when the JSON is malformed or incomplete
 */
export function parseServiceAccount(json: string, setting: string): ServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigurationError(`${setting} is not valid JSON: ${errorMessage(error)}`, [setting]);
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('client_email' in parsed) ||
    !('private_key' in parsed) ||
    typeof parsed.client_email !== 'string' ||
    typeof parsed.private_key !== 'string'
  ) {
    throw new ConfigurationError(
      `${setting} must contain client_email and private_key`,
      [setting]
    );
  }

  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

/**
 * Resolve the service account credential from the environment or Secrets Manager
 */
export async function loadServiceAccountCredentials(
  config: EnvironmentConfig,
  secretsClient: SecretsManagerClient = new SecretsManagerClient({ region: config.awsRegion })
): Promise<ServiceAccountCredentials> {
  if (config.serviceAccountJson) {
    return parseServiceAccount(config.serviceAccountJson, 'GOOGLE_SERVICE_ACCOUNT_JSON');
  }

  let secretString: string | undefined;
  try {
    const response = await secretsClient.send(
      new GetSecretValueCommand({ SecretId: config.serviceAccountSecretArn })
    );
    secretString = response.SecretString;
  } catch (error) {
    throw new SpreadsheetConnectionError(
      'Could not read the service account secret',
      [
        `the secret ARN (GOOGLE_SERVICE_ACCOUNT_SECRET_ARN=${config.serviceAccountSecretArn})`,
        'that the function role may call secretsmanager:GetSecretValue on it',
      ],
      errorMessage(error)
    );
  }

  if (!secretString) {
    throw new ConfigurationError(
      'The service account secret is empty',
      ['GOOGLE_SERVICE_ACCOUNT_SECRET_ARN']
    );
  }

  return parseServiceAccount(secretString, 'GOOGLE_SERVICE_ACCOUNT_SECRET_ARN');
}

/**
 * Look a spreadsheet up by its exact name
 */
async function findSpreadsheetId(drive: drive_v3.Drive, name: string): Promise<string> {
  const escaped = name.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  const response = await drive.files.list({
    q: `name = '${escaped}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
    fields: 'files(id, name)',
    pageSize: 1,
    supportsAllDrives: true,
    includeItemsFromAllDrives: true,
  });

  const id = response.data.files?.[0]?.id;
  if (!id) {
    throw new Error(`No spreadsheet named "${name}" is visible to the service account`);
  }
  return id;
}

/**
 * What an operator should check when the spreadsheet cannot be opened
 */
export function openSpreadsheetHints(config: EnvironmentConfig, clientEmail: string): string[] {
  return [
    config.spreadsheetId
      ? `the spreadsheet id (SPREADSHEET_ID=${config.spreadsheetId})`
      : `the spreadsheet name (SPREADSHEET_NAME=${config.spreadsheetName})`,
    `that the spreadsheet is shared with the service account (${clientEmail})`,
    'the service account credentials',
  ];
}

/**
 * Open the configured spreadsheet
 *
 * @throws SpreadsheetConnectionError listing what to check, with the underlying detail
 */
export async function openSpreadsheet(
  config: EnvironmentConfig,
  secretsClient?: SecretsManagerClient
): Promise<GoogleSheetsClient> {
  const credentials = await loadServiceAccountCredentials(config, secretsClient);

  const auth = new google.auth.GoogleAuth({
    credentials: {
      client_email: credentials.client_email,
      private_key: credentials.private_key,
    },
    scopes: SCOPES,
  });
  const sheets = google.sheets({ version: 'v4', auth });

  try {
    const spreadsheetId = config.spreadsheetId
      || await findSpreadsheetId(google.drive({ version: 'v3', auth }), config.spreadsheetName);

    await sheets.spreadsheets.get({ spreadsheetId, fields: 'spreadsheetId' });

    return new GoogleSheetsClient(sheets, spreadsheetId);
  } catch (error) {
    logSpreadsheet({
      errorMessage: errorMessage(error),
      worksheet: '*',
      operation: 'OPEN',
    });

    throw new SpreadsheetConnectionError(
      'Could not open the spreadsheet',
      openSpreadsheetHints(config, credentials.client_email),
      errorMessage(error)
    );
  }
}
