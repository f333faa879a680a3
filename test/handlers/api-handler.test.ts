/**
 * API Handler Tests
 *
 * Tests for the main Lambda handler entry point, routed over services
 * backed by an in-memory spreadsheet.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { buildServices, createApiHandler, handler } from '../../src/handlers/api-handler';
import { ConfigurationError } from '../../src/models/errors';
import { PlayerStatus } from '../../src/models/player';
import { SeededStore, seedStore } from '../helpers/seed';
import { makeEntry, makePlayer, makeReport } from '../helpers/fixtures';

/**
 * Create a mock API Gateway event
 */
function createMockEvent(
  method: string,
  path: string,
  body?: unknown,
  queryStringParameters?: Record<string, string>
): APIGatewayProxyEvent {
  return {
    httpMethod: method,
    path,
    headers: {},
    body: body === undefined ? null : JSON.stringify(body),
    pathParameters: null,
    queryStringParameters: queryStringParameters || null,
    isBase64Encoded: false,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      protocol: 'HTTP/1.1',
      httpMethod: method,
      path,
      stage: 'test',
      requestId: 'test-request-id',
      requestTimeEpoch: Date.now(),
      resourceId: 'test-resource',
      resourcePath: path,
      identity: {
        sourceIp: '127.0.0.1',
        userAgent: 'test-agent',
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        user: null,
        userArn: null,
      },
      authorizer: null,
    },
    resource: path,
    stageVariables: null,
    multiValueHeaders: {},
    multiValueQueryStringParameters: null,
  };
}

function parseBody(result: APIGatewayProxyResult) {
  return JSON.parse(result.body);
}

describe('API Handler', () => {
  let seeded: SeededStore;
  let api: (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date(2024, 2, 6, 12));
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();

    seeded = await seedStore({
      players: [
        makePlayer({ id: 'p1' }),
        makePlayer({ id: 'p 2', name: 'Bruno Díaz', position: 'Delantero', status: PlayerStatus.FINISHED }),
      ],
      weeklyLog: [makeEntry({ id: 'e1', player_id: 'p1' })],
      reports: [makeReport({ id: 'r1', player_id: 'p1' })],
    });
    const services = buildServices(seeded.store, 'monday');
    api = createApiHandler(async () => services);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    jest.useRealTimers();
  });

  describe('CORS and routing', () => {
    it('should answer preflight requests without resolving services', async () => {
      const resolve = jest.fn(async () => buildServices(seeded.store, 'monday'));

      const result = await createApiHandler(resolve)(createMockEvent('OPTIONS', '/players'));

      expect(result.statusCode).toBe(200);
      expect(result.headers?.['Access-Control-Allow-Origin']).toBe('*');
      expect(resolve).not.toHaveBeenCalled();
    });

    it('should return 404 for unknown routes', async () => {
      const result = await api(createMockEvent('GET', '/teams'));

      expect(result.statusCode).toBe(404);
      expect(parseBody(result).error.message).toBe('Route not found');
    });

    it('should log every request', async () => {
      await api(createMockEvent('GET', '/players'));

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry).toMatchObject({
        log_type: 'API_REQUEST',
        method: 'GET',
        path: '/players',
        status_code: 200,
      });
    });
  });

  describe('players', () => {
    it('should list players with labels', async () => {
      const result = await api(createMockEvent('GET', '/players'));

      expect(result.statusCode).toBe(200);
      expect(parseBody(result).data.players.map((p: { label: string }) => p.label)).toEqual([
        'Ana López — Club Atlético Norte (Arquero)',
        'Bruno Díaz — Club Atlético Norte (Delantero)',
      ]);
    });

    it('should filter by status', async () => {
      const result = await api(createMockEvent('GET', '/players', undefined, { status: 'finalizado' }));

      expect(parseBody(result).data.players.map((p: { id: string }) => p.id)).toEqual(['p 2']);
    });

    it('should reject an unknown status', async () => {
      const result = await api(createMockEvent('GET', '/players', undefined, { status: 'Prestado' }));

      expect(result.statusCode).toBe(400);
      expect(parseBody(result).error.details).toEqual({ status: 'Must be one of Activo, Finalizado, Rescindido' });
    });

    it('should decode the player ID from the path', async () => {
      const result = await api(createMockEvent('GET', '/players/p%202'));

      expect(parseBody(result).data.player.name).toBe('Bruno Díaz');
    });

    it('should create a player', async () => {
      const result = await api(createMockEvent('POST', '/players', { name: 'Eva Paz', position: 'Lateral' }));

      expect(result.statusCode).toBe(201);
      expect(parseBody(result).data.player).toMatchObject({ name: 'Eva Paz', position: 'Lateral', status: 'Activo' });
    });

    it('should return field errors for an invalid player', async () => {
      const result = await api(createMockEvent('POST', '/players', { name: '', position: 'Portero' }));

      expect(result.statusCode).toBe(400);
      expect(parseBody(result).error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Invalid player',
        details: { name: 'Must not be empty', position: 'Must be one of the allowed values' },
      });
    });

    it('should return 404 for an unknown player', async () => {
      const result = await api(createMockEvent('PUT', '/players/missing', { notes: 'x' }));

      expect(result.statusCode).toBe(404);
      expect(parseBody(result).error.message).toBe('Player not found');
    });

    it('should terminate a player', async () => {
      const result = await api(createMockEvent('POST', '/players/p1/terminate', { reason: 'Rescisión de mutuo acuerdo' }));

      expect(parseBody(result).data.player).toMatchObject({
        status: 'Rescindido',
        notes: '[Rescindido: Rescisión de mutuo acuerdo]',
      });
    });

    it('should delete a player with its history', async () => {
      const result = await api(createMockEvent('DELETE', '/players/p1'));

      expect(parseBody(result).data.removed).toEqual({ players: 1, weekly_entries: 1, reports: 1 });
    });

    it('should return the player view', async () => {
      const result = await api(createMockEvent('GET', '/players/p1/view'));

      expect(parseBody(result).data).toMatchObject({
        goalkeeper: true,
        trends: { minutes: [{ week_end: '2024-03-10', value: 90 }] },
      });
    });
  });

  describe('weekly log', () => {
    it('should log a week', async () => {
      const result = await api(createMockEvent('POST', '/weekly-log', { player_id: 'p1', date: '2024-03-13', minutes: 70 }));

      expect(result.statusCode).toBe(201);
      expect(parseBody(result).data.entry).toMatchObject({ week_start: '2024-03-11', minutes: 70 });
    });

    it('should return 409 for a week already logged', async () => {
      const result = await api(createMockEvent('POST', '/weekly-log', { player_id: 'p1', minutes: 70 }));

      expect(result.statusCode).toBe(409);
      expect(parseBody(result).error.code).toBe('CONFLICT');

      const entries = parseBody(await api(createMockEvent('GET', '/players/p1/weekly-log'))).data.entries;
      expect(entries).toHaveLength(1);
    });

    it('should reject counters above the capture limits', async () => {
      const result = await api(createMockEvent('POST', '/weekly-log', { player_id: 'p1', minutes: 1000 }));

      expect(result.statusCode).toBe(400);
      expect(parseBody(result).error.details).toEqual({ minutes: 'Must be <= 900' });
    });

    it('should replace the whole log', async () => {
      const result = await api(
        createMockEvent('PUT', '/weekly-log', { rows: [{ id: 'e1', player_id: 'p1', week_end: '2024-03-10', minutes: 30 }] })
      );

      expect(result.statusCode).toBe(200);
      expect(parseBody(await api(createMockEvent('GET', '/weekly-log'))).data.entries[0].minutes).toBe(30);
    });

    it('should compute the week window', async () => {
      const result = await api(createMockEvent('GET', '/week-window', undefined, { date: '2024-03-13' }));

      expect(parseBody(result).data).toEqual({ week_start: '2024-03-11', week_end: '2024-03-17' });
    });
  });

  describe('reports', () => {
    it('should create and list reports', async () => {
      const created = await api(
        createMockEvent('POST', '/players/p1/reports', { title: 'Marzo', body: 'Sigue como titular.', report_date: '2024-03-20' })
      );
      expect(created.statusCode).toBe(201);

      const listed = await api(createMockEvent('GET', '/players/p1/reports'));
      expect(parseBody(listed).data.reports.map((r: { title: string }) => r.title)).toEqual([
        'Marzo',
        'Seguimiento de marzo',
      ]);
    });
  });

  describe('summary', () => {
    it('should apply query filters', async () => {
      const result = await api(
        createMockEvent('GET', '/summary', undefined, { status: 'Activo,Finalizado', onlyWithMinutes: 'false' })
      );

      const data = parseBody(result).data;
      expect(data.filters).toEqual({
        statuses: ['Activo', 'Finalizado'],
        positions: [],
        countries: [],
        onlyWithMinutes: false,
      });
      expect(data.metrics).toEqual({ players: 2, minutes_total: 90, matches_total: 1, red_total: 0 });
    });

    it('should reject a malformed flag', async () => {
      const result = await api(createMockEvent('GET', '/summary', undefined, { onlyWithMinutes: 'yes' }));

      expect(result.statusCode).toBe(400);
    });
  });

  describe('export', () => {
    it('should download a table as CSV', async () => {
      const result = await api(createMockEvent('GET', '/export/reportes.csv'));

      expect(result.headers?.['Content-Type']).toBe('text/csv; charset=utf-8');
      expect(result.headers?.['Content-Disposition']).toBe('attachment; filename="reportes.csv"');
      expect(result.body.split('\r\n')[0]).toBe(
        'reporte_id,jugador_id,titulo,fecha_reporte,fecha_creacion,contenido,created_at,updated_at'
      );
    });

    it('should reject an unknown table', async () => {
      const result = await api(createMockEvent('GET', '/export/equipos.csv'));

      expect(result.statusCode).toBe(400);
      expect(parseBody(result).error.message).toBe('Unknown table: equipos');
    });

    it('should download the workbook base64-encoded', async () => {
      const result = await api(createMockEvent('GET', '/export/workbook.xlsx'));

      expect(result.isBase64Encoded).toBe(true);
      expect(result.headers?.['Content-Disposition']).toBe('attachment; filename="prestamos.xlsx"');
      // xlsx files are zip archives
      expect(Buffer.from(result.body, 'base64').subarray(0, 2).toString()).toBe('PK');
    });
  });

  describe('failures', () => {
    it('should report spreadsheet outages as 503', async () => {
      seeded.client.failWith = new Error('Backend error');
      seeded.store.invalidate();

      const result = await api(createMockEvent('GET', '/players'));

      expect(result.statusCode).toBe(503);
      expect(parseBody(result).error).toMatchObject({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Spreadsheet read failed for worksheet jugadores',
      });
    });

    it('should report configuration errors from the resolver', async () => {
      const failing = createApiHandler(async () => {
        throw new ConfigurationError('Missing required configuration: SPREADSHEET_NAME', ['SPREADSHEET_NAME']);
      });

      const result = await failing(createMockEvent('GET', '/players'));

      expect(result.statusCode).toBe(500);
      expect(parseBody(result).error.details).toEqual({ settings: ['SPREADSHEET_NAME'] });
    });
  });

  describe('handler', () => {
    const KEYS = ['SPREADSHEET_NAME', 'SPREADSHEET_ID', 'GOOGLE_SERVICE_ACCOUNT_JSON', 'GOOGLE_SERVICE_ACCOUNT_SECRET_ARN'];
    const saved: Record<string, string | undefined> = {};

    beforeEach(() => {
      for (const key of KEYS) {
        saved[key] = process.env[key];
        delete process.env[key];
      }
    });

    afterEach(() => {
      for (const key of KEYS) {
        if (saved[key] !== undefined) {
          process.env[key] = saved[key];
        }
      }
    });

    it('should fail with a configuration error when nothing is configured', async () => {
      const result = await handler(createMockEvent('GET', '/summary'));

      expect(result.statusCode).toBe(500);
      expect(parseBody(result).error).toMatchObject({
        code: 'CONFIGURATION_ERROR',
        details: {
          settings: ['SPREADSHEET_NAME', 'GOOGLE_SERVICE_ACCOUNT_JSON (or GOOGLE_SERVICE_ACCOUNT_SECRET_ARN)'],
        },
      });
    });
  });
});
