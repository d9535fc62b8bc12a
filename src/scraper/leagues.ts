/**
 * Static league definitions
 */

import type { LeagueDefinition, LeagueId } from '../types/index.js';

export const LEAGUES: Record<LeagueId, LeagueDefinition> = {
  eredivisie: {
    id: 'eredivisie',
    name: 'Eredivisie',
    url: 'https://eredivisie.nl/competitie/stand/',
    expectedTeams: 18,
    minTeams: 10,
  },
  kkd: {
    id: 'kkd',
    name: 'Keuken Kampioen Divisie',
    url: 'https://keukenkampioendivisie.nl/klassement',
    expectedTeams: 20,
    minTeams: 10,
  },
};

export function isLeagueId(value: string): value is LeagueId {
  return Object.prototype.hasOwnProperty.call(LEAGUES, value);
}
