/**
 * Main Lambda Handler Entry Point
 *
 * Handles all API Gateway requests with routing, body validation,
 * error handling, and structured logging.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { handleError } from '../middleware/error-handler';
import { BadRequestError } from '../models/errors';
import { HttpStatus } from '../models/response';
import { PlayerStatus, parsePlayerStatus } from '../models/player';
import { SummaryFilters } from '../models/summary';
import { TableName, isTableName } from '../models/table';
import {
  successResponse,
  fileResponse,
  notFoundErrorResponse,
  generateRequestId,
} from '../utils/response-formatter';
import {
  parseJsonBody,
  validateCreatePlayer,
  validateReport,
  validateTerminate,
  validateUpdatePlayer,
  validateWeeklyEntry,
  validateWeeklyReplace,
} from '../utils/request-validation';
import { WeekConvention } from '../utils/week-window';
import { logRequest } from '../utils/logger';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { openSpreadsheet } from '../config/spreadsheet';

// Import services
import { PlayerService } from '../services/player-service';
import { WeeklyLogService } from '../services/weekly-log-service';
import { ReportService } from '../services/report-service';
import { SummaryService } from '../services/summary-service';
import { PlayerViewService } from '../services/player-view-service';
import { ExportService } from '../services/export-service';

// Import repositories
import { TableStore } from '../repositories/table-store';
import { PlayerRepository } from '../repositories/player-repository';
import { WeeklyLogRepository } from '../repositories/weekly-log-repository';
import { ReportRepository } from '../repositories/report-repository';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface Services {
  playerService: PlayerService;
  weeklyLogService: WeeklyLogService;
  reportService: ReportService;
  summaryService: SummaryService;
  playerViewService: PlayerViewService;
  exportService: ExportService;
}

/**
 * What a route handler receives
 */
interface RouteRequest {
  event: APIGatewayProxyEvent;
  params: string[];      // regex captures from the path, URI-decoded
  requestId: string;
}

/**
 * Route handler function type
 */
type RouteHandler = (services: Services, request: RouteRequest) => Promise<APIGatewayProxyResult>;

/**
 * Route definition
 */
interface Route {
  method: string;
  pathPattern: RegExp;
  handler: RouteHandler;
}

/**
 * Wire repositories and services over one table store
 */
export function buildServices(store: TableStore, convention: WeekConvention): Services {
  const playerRepository = new PlayerRepository(store);
  const weeklyLogRepository = new WeeklyLogRepository(store, convention);
  const reportRepository = new ReportRepository(store);

  return {
    playerService: new PlayerService(playerRepository, weeklyLogRepository, reportRepository),
    weeklyLogService: new WeeklyLogService(weeklyLogRepository, playerRepository, convention),
    reportService: new ReportService(reportRepository, playerRepository),
    summaryService: new SummaryService(playerRepository, weeklyLogRepository),
    playerViewService: new PlayerViewService(playerRepository, weeklyLogRepository, reportRepository),
    exportService: new ExportService(playerRepository, weeklyLogRepository, reportRepository, convention),
  };
}

/**
 * Extract query parameter from event
 */
function getQueryParameter(event: APIGatewayProxyEvent, name: string): string | undefined {
  return event.queryStringParameters?.[name] ?? undefined;
}

/**
 * Comma separated query list; undefined when the parameter is absent
 */
function getQueryList(event: APIGatewayProxyEvent, name: string): string[] | undefined {
  const value = getQueryParameter(event, name);
  if (value === undefined) {
    return undefined;
  }
  return value.split(',').map((item) => item.trim()).filter((item) => item !== '');
}

function parseStatusParameter(value: string): PlayerStatus {
  const status = parsePlayerStatus(value);
  if (!status) {
    throw new BadRequestError(`Unknown status: ${value}`, {
      status: `Must be one of ${Object.values(PlayerStatus).join(', ')}`,
    });
  }
  return status;
}

function parseSummaryFilters(event: APIGatewayProxyEvent): SummaryFilters {
  const filters: SummaryFilters = {};

  const statuses = getQueryList(event, 'status');
  if (statuses) filters.statuses = statuses.map(parseStatusParameter);

  const positions = getQueryList(event, 'position');
  if (positions) filters.positions = positions;

  const countries = getQueryList(event, 'country');
  if (countries) filters.countries = countries;

  const onlyWithMinutes = getQueryParameter(event, 'onlyWithMinutes');
  if (onlyWithMinutes !== undefined) {
    if (onlyWithMinutes !== 'true' && onlyWithMinutes !== 'false') {
      throw new BadRequestError('Invalid onlyWithMinutes', { onlyWithMinutes: 'Expected true or false' });
    }
    filters.onlyWithMinutes = onlyWithMinutes === 'true';
  }

  return filters;
}

/**
 * Route handlers
 */

// GET /players
async function listPlayers(services: Services, { event, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const status = getQueryParameter(event, 'status');
  const players = await services.playerService.listPlayers(status ? parseStatusParameter(status) : undefined);
  return successResponse({ players }, HttpStatus.OK, requestId);
}

// POST /players
async function createPlayer(services: Services, { event, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const input = validateCreatePlayer(parseJsonBody(event.body));
  const player = await services.playerService.createPlayer(input);
  return successResponse({ player }, HttpStatus.CREATED, requestId);
}

// GET /players/{id}
async function getPlayer(services: Services, { params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const player = await services.playerService.getPlayer(params[0]);
  return successResponse({ player }, HttpStatus.OK, requestId);
}

// PUT /players/{id}
async function updatePlayer(services: Services, { event, params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const fields = validateUpdatePlayer(parseJsonBody(event.body));
  const player = await services.playerService.updatePlayer(params[0], fields);
  return successResponse({ player }, HttpStatus.OK, requestId);
}

// POST /players/{id}/terminate
async function terminatePlayer(services: Services, { event, params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const reason = validateTerminate(parseJsonBody(event.body));
  const player = await services.playerService.terminatePlayer(params[0], reason);
  return successResponse({ player }, HttpStatus.OK, requestId);
}

// DELETE /players/{id}
async function deletePlayer(services: Services, { params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const removed = await services.playerService.deletePlayer(params[0]);
  return successResponse({ removed }, HttpStatus.OK, requestId);
}

// GET /players/{id}/view
async function getPlayerView(services: Services, { params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const view = await services.playerViewService.getPlayerView(params[0]);
  return successResponse(view, HttpStatus.OK, requestId);
}

// GET /players/{id}/weekly-log
async function getPlayerWeeklyLog(services: Services, { params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const entries = await services.weeklyLogService.listForPlayer(params[0]);
  return successResponse({ entries }, HttpStatus.OK, requestId);
}

// GET /players/{id}/reports
async function getPlayerReports(services: Services, { params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const reports = await services.reportService.listForPlayer(params[0]);
  return successResponse({ reports }, HttpStatus.OK, requestId);
}

// POST /players/{id}/reports
async function createReport(services: Services, { event, params, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const input = validateReport(parseJsonBody(event.body));
  const report = await services.reportService.createReport(params[0], input);
  return successResponse({ report }, HttpStatus.CREATED, requestId);
}

// GET /weekly-log
async function listWeeklyLog(services: Services, { requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const entries = await services.weeklyLogService.listAll();
  return successResponse({ entries }, HttpStatus.OK, requestId);
}

// POST /weekly-log
async function logWeek(services: Services, { event, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const input = validateWeeklyEntry(parseJsonBody(event.body));
  const entry = await services.weeklyLogService.logWeek(input);
  return successResponse({ entry }, HttpStatus.CREATED, requestId);
}

// PUT /weekly-log
async function replaceWeeklyLog(services: Services, { event, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const rows = validateWeeklyReplace(parseJsonBody(event.body));
  const entries = await services.weeklyLogService.replaceAll(rows);
  return successResponse({ entries }, HttpStatus.OK, requestId);
}

// GET /week-window
async function getWeekWindow(services: Services, { event, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const window = services.weeklyLogService.getWeekWindow(getQueryParameter(event, 'date'));
  return successResponse(window, HttpStatus.OK, requestId);
}

// GET /summary
async function getSummary(services: Services, { event, requestId }: RouteRequest): Promise<APIGatewayProxyResult> {
  const summary = await services.summaryService.getSummary(parseSummaryFilters(event));
  return successResponse(summary, HttpStatus.OK, requestId);
}

// GET /export/{table}.csv
async function exportCsv(services: Services, { params }: RouteRequest): Promise<APIGatewayProxyResult> {
  const table = params[0];
  if (!isTableName(table)) {
    throw new BadRequestError(`Unknown table: ${table}`, {
      table: `Must be one of ${Object.values(TableName).join(', ')}`,
    });
  }
  const csv = await services.exportService.exportCsv(table);
  return fileResponse(csv, 'text/csv; charset=utf-8', `${table}.csv`);
}

// GET /export/workbook.xlsx
async function exportWorkbook(services: Services): Promise<APIGatewayProxyResult> {
  const workbook = await services.exportService.exportWorkbook();
  return fileResponse(workbook, XLSX_CONTENT_TYPE, 'prestamos.xlsx');
}

/**
 * Route definitions
 * Note: the stage prefix is not part of the received path
 */
const routes: Route[] = [
  { method: 'GET', pathPattern: /^\/players$/, handler: listPlayers },
  { method: 'POST', pathPattern: /^\/players$/, handler: createPlayer },
  { method: 'GET', pathPattern: /^\/players\/([^/]+)$/, handler: getPlayer },
  { method: 'PUT', pathPattern: /^\/players\/([^/]+)$/, handler: updatePlayer },
  { method: 'DELETE', pathPattern: /^\/players\/([^/]+)$/, handler: deletePlayer },
  { method: 'POST', pathPattern: /^\/players\/([^/]+)\/terminate$/, handler: terminatePlayer },
  { method: 'GET', pathPattern: /^\/players\/([^/]+)\/view$/, handler: getPlayerView },
  { method: 'GET', pathPattern: /^\/players\/([^/]+)\/weekly-log$/, handler: getPlayerWeeklyLog },
  { method: 'GET', pathPattern: /^\/players\/([^/]+)\/reports$/, handler: getPlayerReports },
  { method: 'POST', pathPattern: /^\/players\/([^/]+)\/reports$/, handler: createReport },
  { method: 'GET', pathPattern: /^\/weekly-log$/, handler: listWeeklyLog },
  { method: 'POST', pathPattern: /^\/weekly-log$/, handler: logWeek },
  { method: 'PUT', pathPattern: /^\/weekly-log$/, handler: replaceWeeklyLog },
  { method: 'GET', pathPattern: /^\/week-window$/, handler: getWeekWindow },
  { method: 'GET', pathPattern: /^\/summary$/, handler: getSummary },
  { method: 'GET', pathPattern: /^\/export\/workbook\.xlsx$/, handler: exportWorkbook },
  { method: 'GET', pathPattern: /^\/export\/([^/]+)\.csv$/, handler: exportCsv },
];

/**
 * Find matching route for request, with its path captures
 */
function findRoute(method: string, path: string): { route: Route; params: string[] } | null {
  for (const route of routes) {
    if (route.method !== method) {
      continue;
    }
    const match = route.pathPattern.exec(path);
    if (match) {
      return { route, params: match.slice(1).map((param) => decodeURIComponent(param)) };
    }
  }
  return null;
}

/**
 * Build a handler over a service resolver
 *
 * The handler:
 * 1. Generates a unique request_id for tracing
 * 2. Resolves the services (configuration is validated there)
 * 3. Routes requests to the matching service call
 * 4. Handles errors and formats responses
 * 5. Logs every request with structured logging
 *
 * @param resolveServices - Called on every request; may cache
 */
export function createApiHandler(
  resolveServices: () => Promise<Services>
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  return async (event) => {
    const startTime = Date.now();
    const requestId = generateRequestId();
    const method = event.httpMethod;
    const path = event.path;

    let result: APIGatewayProxyResult;
    try {
      // CORS preflight
      if (method === 'OPTIONS') {
        return successResponse({}, HttpStatus.OK, requestId);
      }

      const services = await resolveServices();

      const match = findRoute(method, path);
      result = match
        ? await match.route.handler(services, { event, params: match.params, requestId })
        : notFoundErrorResponse('Route not found', requestId);
    } catch (error) {
      // Use centralized error handling middleware
      result = handleError(error, requestId);
    }

    logRequest({
      requestId,
      method,
      path,
      statusCode: result.statusCode,
      latencyMs: Date.now() - startTime,
    });

    return result;
  };
}

/**
 * Services built on first use and reused across warm invocations
 */
let services: Promise<Services> | null = null;

async function connect(): Promise<Services> {
  const config = loadEnvironmentConfig();
  validateEnvironmentConfig(config);

  const client = await openSpreadsheet(config);
  const store = new TableStore(client, { cacheTtlMs: config.cacheTtlSeconds * 1000 });
  return buildServices(store, config.weekConvention);
}

/**
 * Resolve the process-wide services; a failed connection is not kept
 */
export async function getServices(): Promise<Services> {
  if (!services) {
    services = connect();
  }

  try {
    return await services;
  } catch (error) {
    services = null;
    throw error;
  }
}

/**
 * Main Lambda handler
 */
export const handler = createApiHandler(getServices);
