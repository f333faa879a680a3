/**
 * Spreadsheet Connection Tests
 */

import { mockClient } from 'aws-sdk-client-mock';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import {
  parseServiceAccount,
  loadServiceAccountCredentials,
  openSpreadsheet,
  openSpreadsheetHints,
} from '../../src/config/spreadsheet';
import { EnvironmentConfig } from '../../src/config/environment';
import { ConfigurationError, SpreadsheetConnectionError } from '../../src/models/errors';

const mockSpreadsheetsGet = jest.fn();
const mockBatchUpdate = jest.fn();
const mockValuesGet = jest.fn();
const mockValuesClear = jest.fn();
const mockValuesAppend = jest.fn();
const mockFilesList = jest.fn();

jest.mock('googleapis', () => ({
  google: {
    auth: { GoogleAuth: jest.fn() },
    sheets: jest.fn(() => ({
      spreadsheets: {
        get: mockSpreadsheetsGet,
        batchUpdate: mockBatchUpdate,
        values: { get: mockValuesGet, clear: mockValuesClear, append: mockValuesAppend },
      },
    })),
    drive: jest.fn(() => ({ files: { list: mockFilesList } })),
  },
}));

const secretsMock = mockClient(SecretsManagerClient);

const SERVICE_ACCOUNT = JSON.stringify({
  client_email: 'loans@test-project.iam.gserviceaccount.com',
  private_key: 'test-secret',
});

function makeConfig(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return {
    spreadsheetName: 'Prestamos',
    spreadsheetId: '',
    serviceAccountJson: SERVICE_ACCOUNT,
    serviceAccountSecretArn: '',
    weekConvention: 'monday',
    cacheTtlSeconds: 30,
    awsRegion: 'us-east-1',
    ...overrides,
  };
}

describe('Spreadsheet Connection', () => {
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    secretsMock.reset();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    mockSpreadsheetsGet.mockResolvedValue({ data: {} });
    mockFilesList.mockResolvedValue({ data: { files: [{ id: 'found-id', name: 'Prestamos' }] } });
    mockValuesClear.mockResolvedValue({ data: {} });
    mockValuesAppend.mockResolvedValue({ data: {} });
    mockBatchUpdate.mockResolvedValue({ data: {} });
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe('parseServiceAccount', () => {
    it('should return the email and key', () => {
      expect(parseServiceAccount(SERVICE_ACCOUNT, 'GOOGLE_SERVICE_ACCOUNT_JSON')).toEqual({
        client_email: 'loans@test-project.iam.gserviceaccount.com',
        private_key: 'test-secret',
      });
    });

    it('should reject malformed JSON naming the setting', () => {
      expect(() => parseServiceAccount('{', 'GOOGLE_SERVICE_ACCOUNT_JSON')).toThrow(ConfigurationError);
      expect(() => parseServiceAccount('{', 'GOOGLE_SERVICE_ACCOUNT_JSON')).toThrow(
        'GOOGLE_SERVICE_ACCOUNT_JSON is not valid JSON'
      );
    });

    it('should reject JSON without the key', () => {
      expect(() => parseServiceAccount('{"client_email":"a@b.co"}', 'GOOGLE_SERVICE_ACCOUNT_JSON')).toThrow(
        'GOOGLE_SERVICE_ACCOUNT_JSON must contain client_email and private_key'
      );
    });
  });

  describe('loadServiceAccountCredentials', () => {
    const secretConfig = makeConfig({
      serviceAccountJson: '',
      serviceAccountSecretArn: 'arn:aws:secretsmanager:us-east-1:000000000000:secret:test',
    });

    it('should prefer the inline JSON', async () => {
      const credentials = await loadServiceAccountCredentials(makeConfig(), new SecretsManagerClient({}));

      expect(credentials.private_key).toBe('test-secret');
      expect(secretsMock.commandCalls(GetSecretValueCommand)).toHaveLength(0);
    });

    it('should read the secret when no inline JSON is set', async () => {
      secretsMock.on(GetSecretValueCommand).resolves({ SecretString: SERVICE_ACCOUNT });

      const credentials = await loadServiceAccountCredentials(secretConfig, new SecretsManagerClient({}));

      expect(credentials.client_email).toBe('loans@test-project.iam.gserviceaccount.com');
      expect(secretsMock.commandCalls(GetSecretValueCommand)[0].args[0].input).toEqual({
        SecretId: 'arn:aws:secretsmanager:us-east-1:000000000000:secret:test',
      });
    });

    it('should report an unreadable secret as a connection error', async () => {
      secretsMock.on(GetSecretValueCommand).rejects(new Error('AccessDenied'));

      await expect(loadServiceAccountCredentials(secretConfig, new SecretsManagerClient({}))).rejects.toMatchObject({
        name: 'SpreadsheetConnectionError',
        message: 'Could not read the service account secret',
        detail: 'AccessDenied',
      });
    });

    it('should reject an empty secret', async () => {
      secretsMock.on(GetSecretValueCommand).resolves({});

      await expect(loadServiceAccountCredentials(secretConfig, new SecretsManagerClient({}))).rejects.toThrow(
        'The service account secret is empty'
      );
    });
  });

  describe('openSpreadsheetHints', () => {
    it('should name the id when one is configured', () => {
      expect(openSpreadsheetHints(makeConfig({ spreadsheetId: 'sheet-123' }), 'a@b.co')).toEqual([
        'the spreadsheet id (SPREADSHEET_ID=sheet-123)',
        'that the spreadsheet is shared with the service account (a@b.co)',
        'the service account credentials',
      ]);
    });

    it('should name the spreadsheet name otherwise', () => {
      expect(openSpreadsheetHints(makeConfig(), 'a@b.co')[0]).toBe('the spreadsheet name (SPREADSHEET_NAME=Prestamos)');
    });
  });

  describe('openSpreadsheet', () => {
    it('should open by id without searching Drive', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));

      expect(client.spreadsheetId).toBe('sheet-123');
      expect(mockFilesList).not.toHaveBeenCalled();
      expect(mockSpreadsheetsGet).toHaveBeenCalledWith({ spreadsheetId: 'sheet-123', fields: 'spreadsheetId' });
    });

    it('should look the spreadsheet up by name', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetName: "Préstamos d'Ana" }));

      expect(client.spreadsheetId).toBe('found-id');
      expect(mockFilesList.mock.calls[0][0].q).toBe(
        "name = 'Préstamos d\\'Ana' and mimeType = 'application/vnd.google-apps.spreadsheet' and trashed = false"
      );
    });

    it('should fail with hints when the spreadsheet is not found', async () => {
      mockFilesList.mockResolvedValue({ data: { files: [] } });

      let caught: unknown;
      try {
        await openSpreadsheet(makeConfig());
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SpreadsheetConnectionError);
      expect(caught).toMatchObject({
        message: 'Could not open the spreadsheet',
        hints: [
          'the spreadsheet name (SPREADSHEET_NAME=Prestamos)',
          'that the spreadsheet is shared with the service account (loans@test-project.iam.gserviceaccount.com)',
          'the service account credentials',
        ],
        detail: 'No spreadsheet named "Prestamos" is visible to the service account',
      });
      expect(JSON.parse(consoleErrorSpy.mock.calls[0][0])).toMatchObject({
        log_type: 'SPREADSHEET_ERROR',
        operation: 'OPEN',
        worksheet: '*',
      });
    });

    it('should fail when the spreadsheet cannot be read', async () => {
      mockSpreadsheetsGet.mockRejectedValue(new Error('The caller does not have permission'));

      await expect(openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }))).rejects.toMatchObject({
        detail: 'The caller does not have permission',
      });
    });
  });

  describe('GoogleSheetsClient', () => {
    it('should list worksheet titles', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));
      mockSpreadsheetsGet.mockResolvedValue({
        data: { sheets: [{ properties: { title: 'jugadores' } }, { properties: {} }] },
      });

      expect(await client.listWorksheets()).toEqual(['jugadores']);
    });

    it('should read every cell as text', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));
      mockValuesGet.mockResolvedValue({ data: { values: [['minutos', 'goles'], [90, null]] } });

      expect(await client.readValues("O'Higgins")).toEqual([['minutos', 'goles'], ['90', '']]);
      expect(mockValuesGet).toHaveBeenCalledWith({ spreadsheetId: 'sheet-123', range: "'O''Higgins'" });
    });

    it('should read an empty worksheet as no rows', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));
      mockValuesGet.mockResolvedValue({ data: {} });

      expect(await client.readValues('reportes')).toEqual([]);
    });

    it('should add a worksheet with the given grid', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));

      await client.addWorksheet('reportes', 1000, 20);

      expect(mockBatchUpdate.mock.calls[0][0].requestBody.requests[0].addSheet.properties).toEqual({
        title: 'reportes',
        gridProperties: { rowCount: 1000, columnCount: 20 },
      });
    });

    it('should clear then append when overwriting', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));

      await client.overwriteValues('seguimiento', [['id'], ['e1']]);

      expect(mockValuesClear).toHaveBeenCalledWith({ spreadsheetId: 'sheet-123', range: "'seguimiento'" });
      expect(mockValuesAppend).toHaveBeenCalledWith({
        spreadsheetId: 'sheet-123',
        range: "'seguimiento'!A1",
        valueInputOption: 'RAW',
        insertDataOption: 'OVERWRITE',
        requestBody: { values: [['id'], ['e1']] },
      });
    });

    it('should only clear when there is nothing to write', async () => {
      const client = await openSpreadsheet(makeConfig({ spreadsheetId: 'sheet-123' }));

      await client.overwriteValues('seguimiento', []);

      expect(mockValuesClear).toHaveBeenCalledTimes(1);
      expect(mockValuesAppend).not.toHaveBeenCalled();
    });
  });
});
