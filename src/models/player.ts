/**
 * Player Models
 *
 * Type definitions for players on loan and their worksheet representation.
 */

import { IsoDate, TableDefinition, TableName, Timestamp } from './table';
import { RowReader, encodeBool, encodeDate } from '../utils/row-normalizer';

/**
 * Player lifecycle states, stored with their Spanish labels
 */
export enum PlayerStatus {
  ACTIVE = 'Activo',
  FINISHED = 'Finalizado',
  TERMINATED = 'Rescindido',
}

export const POSITIONS = [
  'Arquero',
  'Defensor central',
  'Lateral',
  'Mediocampista defensivo',
  'Mediocampista mixto',
  'Mediocampista ofensivo',
  'Extremo',
  'Delantero',
] as const;

export const DIVISIONS = ['1° división', '2° división', '3° división'] as const;

/**
 * Player entity
 */
export interface Player {
  id: string;                    // UUID
  name: string;
  position: string;              // one of POSITIONS for new players; stored free text is kept
  birth_date: IsoDate | null;
  loan_country: string;
  loan_division: string;
  loan_club: string;
  buy_option: boolean;
  buy_back: boolean;             // repechage clause
  return_date: IsoDate | null;
  contract_end: IsoDate | null;
  status: PlayerStatus;
  notes: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

/**
 * Editable player fields (everything except identity and audit timestamps)
 */
export type PlayerFields = Omit<Player, 'id' | 'created_at' | 'updated_at'>;

/**
 * Worksheet definition for players
 */
export const PLAYER_TABLE: TableDefinition = {
  name: TableName.PLAYERS,
  columns: [
    'jugador_id',
    'nombre',
    'puesto',
    'fecha_nacimiento',
    'pais_prestamo',
    'division_prestamo',
    'club_prestamo',
    'opcion_compra',
    'opcion_repesca',
    'fecha_retorno',
    'fin_contrato_aaaj',
    'estado',
    'observaciones',
    'created_at',
    'updated_at',
  ],
};

/**
 * Match a stored status label, case-insensitively
 */
export function parsePlayerStatus(value: string): PlayerStatus | null {
  const normalized = value.trim().toLowerCase();
  const match = Object.values(PlayerStatus).find((status) => status.toLowerCase() === normalized);
  return match ?? null;
}

export function isGoalkeeper(position: string | null | undefined): boolean {
  if (!position) {
    return false;
  }
  const normalized = position.trim().toLowerCase();
  return normalized.includes('arquero') || ['gk', 'goalkeeper', 'portero'].includes(normalized);
}

/**
 * Selector label: "name — club (position)"
 */
export function playerLabel(player: Pick<Player, 'name' | 'loan_club' | 'position'>): string {
  return `${player.name} — ${player.loan_club} (${player.position})`;
}

/**
 * Convert a worksheet row to a Player
 */
export function mapPlayerRow(row: RowReader): Player {
  const rawStatus = row.text('estado');
  let status = parsePlayerStatus(rawStatus);
  if (!status) {
    if (rawStatus.trim() !== '') {
      row.report('estado', rawStatus, 'unknown status');
    }
    status = PlayerStatus.ACTIVE;
  }

  return {
    id: row.text('jugador_id'),
    name: row.text('nombre'),
    position: row.text('puesto'),
    birth_date: row.date('fecha_nacimiento'),
    loan_country: row.text('pais_prestamo'),
    loan_division: row.text('division_prestamo'),
    loan_club: row.text('club_prestamo'),
    buy_option: row.bool('opcion_compra'),
    buy_back: row.bool('opcion_repesca'),
    return_date: row.date('fecha_retorno'),
    contract_end: row.date('fin_contrato_aaaj'),
    status,
    notes: row.text('observaciones'),
    created_at: row.text('created_at'),
    updated_at: row.text('updated_at'),
  };
}

/**
 * Convert a Player to worksheet cells keyed by column
 */
export function playerToRecord(player: Player): Record<string, string> {
  return {
    jugador_id: player.id,
    nombre: player.name,
    puesto: player.position,
    fecha_nacimiento: encodeDate(player.birth_date),
    pais_prestamo: player.loan_country,
    division_prestamo: player.loan_division,
    club_prestamo: player.loan_club,
    opcion_compra: encodeBool(player.buy_option),
    opcion_repesca: encodeBool(player.buy_back),
    fecha_retorno: encodeDate(player.return_date),
    fin_contrato_aaaj: encodeDate(player.contract_end),
    estado: player.status,
    observaciones: player.notes,
    created_at: player.created_at,
    updated_at: player.updated_at,
  };
}
