/**
 * Request Validation Module
 *
 * Validates request bodies against JSON schemas using ajv and converts them
 * into service inputs. Returns 400 with field-specific errors for invalid
 * bodies. Capture limits for weekly counters are enforced here.
 */

import Ajv, { ErrorObject, JSONSchemaType, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { DIVISIONS, POSITIONS, PlayerFields, PlayerStatus, parsePlayerStatus } from '../models/player';
import { ValidationError } from '../middleware/error-handler';
import { NewPlayerInput } from './roster-operations';
import { EditedWeeklyRow } from './weekly-log-operations';
import { LogWeekInput } from '../services/weekly-log-service';
import { CreateReportInput } from '../services/report-service';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

// date (YYYY-MM-DD), uuid
addFormats(ajv);

/**
 * Capture limits per weekly counter
 */
export const STAT_LIMITS = {
  matches: 10,
  minutes: 900,
  goals_scored: 50,
  goals_conceded: 50,
  yellow_cards: 10,
  red_cards: 10,
} as const;

const NON_BLANK = '\\S';

/**
 * Player create / update body
 */
interface PlayerBody {
  name?: string;
  position?: string;
  birth_date?: string | null;
  loan_country?: string;
  loan_division?: string;
  loan_club?: string;
  buy_option?: boolean;
  buy_back?: boolean;
  return_date?: string | null;
  contract_end?: string | null;
  status?: string;
  notes?: string;
}

const playerProperties = {
  name: { type: 'string', pattern: NON_BLANK, nullable: true },
  position: { type: 'string', enum: [...POSITIONS], nullable: true },
  birth_date: { type: 'string', format: 'date', nullable: true },
  loan_country: { type: 'string', nullable: true },
  loan_division: { type: 'string', enum: [...DIVISIONS], nullable: true },
  loan_club: { type: 'string', nullable: true },
  buy_option: { type: 'boolean', nullable: true },
  buy_back: { type: 'boolean', nullable: true },
  return_date: { type: 'string', format: 'date', nullable: true },
  contract_end: { type: 'string', format: 'date', nullable: true },
  status: { type: 'string', enum: Object.values(PlayerStatus), nullable: true },
  notes: { type: 'string', nullable: true },
} as const;

interface CreatePlayerBody extends PlayerBody {
  name: string;
}

const createPlayerSchema: JSONSchemaType<CreatePlayerBody> = {
  type: 'object',
  properties: {
    ...playerProperties,
    name: { type: 'string', pattern: NON_BLANK },
  },
  required: ['name'],
  additionalProperties: false,
};

const updatePlayerSchema: JSONSchemaType<PlayerBody> = {
  type: 'object',
  properties: playerProperties,
  minProperties: 1,
  additionalProperties: false,
};

interface TerminateBody {
  reason?: string;
}

const terminateSchema: JSONSchemaType<TerminateBody> = {
  type: 'object',
  properties: {
    reason: { type: 'string', nullable: true },
  },
  additionalProperties: false,
};

/**
 * Weekly capture body
 */
interface WeeklyEntryBody {
  player_id: string;
  date?: string;
  matches?: number;
  minutes?: number;
  goals_scored?: number;
  goals_conceded?: number;
  yellow_cards?: number;
  red_cards?: number;
  incidents?: string;
}

const statProperties = {
  matches: { type: 'integer', minimum: 0, maximum: STAT_LIMITS.matches, nullable: true },
  minutes: { type: 'integer', minimum: 0, maximum: STAT_LIMITS.minutes, nullable: true },
  goals_scored: { type: 'integer', minimum: 0, maximum: STAT_LIMITS.goals_scored, nullable: true },
  goals_conceded: { type: 'integer', minimum: 0, maximum: STAT_LIMITS.goals_conceded, nullable: true },
  yellow_cards: { type: 'integer', minimum: 0, maximum: STAT_LIMITS.yellow_cards, nullable: true },
  red_cards: { type: 'integer', minimum: 0, maximum: STAT_LIMITS.red_cards, nullable: true },
  incidents: { type: 'string', nullable: true },
} as const;

const weeklyEntrySchema: JSONSchemaType<WeeklyEntryBody> = {
  type: 'object',
  properties: {
    player_id: { type: 'string', minLength: 1 },
    date: { type: 'string', format: 'date', nullable: true },
    ...statProperties,
  },
  required: ['player_id'],
  additionalProperties: false,
};

/**
 * One row of the admin weekly log edit
 */
interface WeeklyRowBody {
  id?: string;
  player_id: string;
  week_start?: string | null;
  week_end?: string | null;
  matches?: number;
  minutes?: number;
  goals_scored?: number;
  goals_conceded?: number;
  yellow_cards?: number;
  red_cards?: number;
  incidents?: string;
  created_at?: string;
}

interface WeeklyReplaceBody {
  rows: WeeklyRowBody[];
}

const weeklyReplaceSchema: JSONSchemaType<WeeklyReplaceBody> = {
  type: 'object',
  properties: {
    rows: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', nullable: true },
          player_id: { type: 'string', minLength: 1 },
          week_start: { type: 'string', format: 'date', nullable: true },
          week_end: { type: 'string', format: 'date', nullable: true },
          ...statProperties,
          created_at: { type: 'string', nullable: true },
        },
        required: ['player_id'],
        additionalProperties: false,
      },
    },
  },
  required: ['rows'],
  additionalProperties: false,
};

interface ReportBody {
  title: string;
  body: string;
  report_date?: string | null;
}

const reportSchema: JSONSchemaType<ReportBody> = {
  type: 'object',
  properties: {
    title: { type: 'string', pattern: NON_BLANK },
    body: { type: 'string', pattern: NON_BLANK },
    report_date: { type: 'string', format: 'date', nullable: true },
  },
  required: ['title', 'body'],
  additionalProperties: false,
};

// Compile schemas
const validators = {
  createPlayer: ajv.compile(createPlayerSchema),
  updatePlayer: ajv.compile(updatePlayerSchema),
  terminate: ajv.compile(terminateSchema),
  weeklyEntry: ajv.compile(weeklyEntrySchema),
  weeklyReplace: ajv.compile(weeklyReplaceSchema),
  report: ajv.compile(reportSchema),
};

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    // required and additionalProperties errors point at the parent object
    const property = error.keyword === 'required'
      ? String(error.params.missingProperty)
      : error.keyword === 'additionalProperties' ? String(error.params.additionalProperty) : '';
    const path = error.instancePath ? error.instancePath.substring(1).replace(/\//g, '.') : '';
    const field = [path, property].filter(Boolean).join('.') || 'body';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${property}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${String(error.params.type)}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${String(error.params.format)}`;
    } else if (error.keyword === 'pattern') {
      message = 'Must not be empty';
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${String(error.params.limit)}`;
    } else if (error.keyword === 'maximum') {
      message = `Must be <= ${String(error.params.limit)}`;
    } else if (error.keyword === 'enum') {
      message = 'Must be one of the allowed values';
    } else if (error.keyword === 'minProperties') {
      message = 'At least one field is required';
    } else if (error.keyword === 'additionalProperties') {
      message = `Unknown field: ${property}`;
    }

    details[field] = message;
  }

  return details;
}

/**
 * Parse a JSON request body; an absent body reads as {}
 */
export function parseJsonBody(body: string | null): unknown {
  if (!body) {
    return {};
  }
  try {
    return JSON.parse(body);
  } catch {
    throw new ValidationError('Request body must be valid JSON', { body: 'Invalid JSON' });
  }
}

function validate<T>(validator: ValidateFunction<T>, body: unknown, message: string): T {
  if (validator(body)) {
    return body;
  }
  throw new ValidationError(message, formatValidationErrors(validator.errors ?? []));
}

/**
 * Keep only the fields that were sent; null clears a date
 */
function toPlayerFields(body: PlayerBody): Partial<PlayerFields> {
  const fields: Partial<PlayerFields> = {};

  if (body.name != null) fields.name = body.name.trim();
  if (body.position != null) fields.position = body.position;
  if (body.birth_date !== undefined) fields.birth_date = body.birth_date;
  if (body.loan_country != null) fields.loan_country = body.loan_country;
  if (body.loan_division != null) fields.loan_division = body.loan_division;
  if (body.loan_club != null) fields.loan_club = body.loan_club;
  if (body.buy_option != null) fields.buy_option = body.buy_option;
  if (body.buy_back != null) fields.buy_back = body.buy_back;
  if (body.return_date !== undefined) fields.return_date = body.return_date;
  if (body.contract_end !== undefined) fields.contract_end = body.contract_end;
  if (body.notes != null) fields.notes = body.notes;

  const status = body.status != null ? parsePlayerStatus(body.status) : null;
  if (status) fields.status = status;

  return fields;
}

export function validateCreatePlayer(body: unknown): NewPlayerInput {
  const valid = validate(validators.createPlayer, body, 'Invalid player');
  return { ...toPlayerFields(valid), name: valid.name.trim() };
}

export function validateUpdatePlayer(body: unknown): Partial<PlayerFields> {
  return toPlayerFields(validate(validators.updatePlayer, body, 'Invalid player'));
}

export function validateTerminate(body: unknown): string | undefined {
  return validate(validators.terminate, body, 'Invalid termination').reason ?? undefined;
}

export function validateWeeklyEntry(body: unknown): LogWeekInput {
  const valid = validate(validators.weeklyEntry, body, 'Invalid weekly entry');

  const input: LogWeekInput = { player_id: valid.player_id };
  if (valid.date != null) input.date = valid.date;
  if (valid.matches != null) input.matches = valid.matches;
  if (valid.minutes != null) input.minutes = valid.minutes;
  if (valid.goals_scored != null) input.goals_scored = valid.goals_scored;
  if (valid.goals_conceded != null) input.goals_conceded = valid.goals_conceded;
  if (valid.yellow_cards != null) input.yellow_cards = valid.yellow_cards;
  if (valid.red_cards != null) input.red_cards = valid.red_cards;
  if (valid.incidents != null) input.incidents = valid.incidents;
  return input;
}

export function validateWeeklyReplace(body: unknown): EditedWeeklyRow[] {
  const valid = validate(validators.weeklyReplace, body, 'Invalid weekly log');

  return valid.rows.map((row) => ({
    id: row.id ?? undefined,
    player_id: row.player_id,
    week_start: row.week_start ?? null,
    week_end: row.week_end ?? null,
    matches: row.matches ?? undefined,
    minutes: row.minutes ?? undefined,
    goals_scored: row.goals_scored ?? undefined,
    goals_conceded: row.goals_conceded ?? undefined,
    yellow_cards: row.yellow_cards ?? undefined,
    red_cards: row.red_cards ?? undefined,
    incidents: row.incidents ?? undefined,
    created_at: row.created_at ?? undefined,
  }));
}

export function validateReport(body: unknown): CreateReportInput {
  const valid = validate(validators.report, body, 'Invalid report');
  return {
    title: valid.title,
    body: valid.body,
    report_date: valid.report_date ?? null,
  };
}
