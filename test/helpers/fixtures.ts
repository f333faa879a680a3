/**
 * Test data builders
 */

import { Player, PlayerStatus } from '../../src/models/player';
import { WeeklyLogEntry } from '../../src/models/weekly-log';
import { Report } from '../../src/models/report';

export function makePlayer(overrides: Partial<Player> = {}): Player {
  return {
    id: 'player-1',
    name: 'Ana López',
    position: 'Arquero',
    birth_date: '2003-05-20',
    loan_country: 'Uruguay',
    loan_division: '1° división',
    loan_club: 'Club Atlético Norte',
    buy_option: false,
    buy_back: false,
    return_date: '2024-12-31',
    contract_end: '2026-06-30',
    status: PlayerStatus.ACTIVE,
    notes: '',
    created_at: '2024-01-10 09:00:00',
    updated_at: '2024-01-10 09:00:00',
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<WeeklyLogEntry> = {}): WeeklyLogEntry {
  return {
    id: 'entry-1',
    player_id: 'player-1',
    week_start: '2024-03-04',
    week_end: '2024-03-10',
    matches: 1,
    minutes: 90,
    goals_scored: 0,
    goals_conceded: 0,
    yellow_cards: 0,
    red_cards: 0,
    incidents: '',
    created_at: '2024-03-10 20:00:00',
    updated_at: '2024-03-10 20:00:00',
    ...overrides,
  };
}

export function makeReport(overrides: Partial<Report> = {}): Report {
  return {
    id: 'report-1',
    player_id: 'player-1',
    title: 'Seguimiento de marzo',
    report_date: '2024-03-15',
    creation_date: '2024-03-15',
    body: 'Buen rendimiento en los últimos partidos.',
    created_at: '2024-03-15 10:00:00',
    updated_at: '2024-03-15 10:00:00',
    ...overrides,
  };
}
