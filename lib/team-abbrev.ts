import { POSITIONS, type Position } from '@/lib/lineup-engine/types'

const TEAM_NAMES: Record<string, string> = {
  ARI: 'Arizona Cardinals',
  ATL: 'Atlanta Falcons',
  BAL: 'Baltimore Ravens',
  BUF: 'Buffalo Bills',
  CAR: 'Carolina Panthers',
  CHI: 'Chicago Bears',
  CIN: 'Cincinnati Bengals',
  CLE: 'Cleveland Browns',
  DAL: 'Dallas Cowboys',
  DEN: 'Denver Broncos',
  DET: 'Detroit Lions',
  GB: 'Green Bay Packers',
  HOU: 'Houston Texans',
  IND: 'Indianapolis Colts',
  JAX: 'Jacksonville Jaguars',
  KC: 'Kansas City Chiefs',
  LAC: 'Los Angeles Chargers',
  LAR: 'Los Angeles Rams',
  LV: 'Las Vegas Raiders',
  MIA: 'Miami Dolphins',
  MIN: 'Minnesota Vikings',
  NE: 'New England Patriots',
  NO: 'New Orleans Saints',
  NYG: 'New York Giants',
  NYJ: 'New York Jets',
  PHI: 'Philadelphia Eagles',
  PIT: 'Pittsburgh Steelers',
  SEA: 'Seattle Seahawks',
  SF: 'San Francisco 49ers',
  TB: 'Tampa Bay Buccaneers',
  TEN: 'Tennessee Titans',
  WAS: 'Washington Commanders',
}

// provider-specific spellings seen in projection and stats feeds
const ALIAS_MAP: Record<string, string> = {
  JAC: 'JAX',
  WSH: 'WAS',
  GNB: 'GB',
  KCC: 'KC',
  NWE: 'NE',
  SFO: 'SF',
  TAM: 'TB',
  NOR: 'NO',
  SDG: 'LAC',
  SD: 'LAC',
  STL: 'LAR',
  LA: 'LAR',
  OAK: 'LV',
  LVR: 'LV',
}

const POSITION_ALIASES: Record<string, Position> = {
  PK: 'K',
  DST: 'DEF',
  'D/ST': 'DEF',
  DEFENSE: 'DEF',
}

export function isKnownTeam(abbrev: string): boolean {
  return Object.prototype.hasOwnProperty.call(TEAM_NAMES, abbrev)
}

export function normalizeTeamAbbrev(raw: string | null | undefined): string | null {
  if (!raw) return null
  const upper = raw.trim().toUpperCase()
  if (!upper) return null

  if (isKnownTeam(upper)) return upper

  const alias = ALIAS_MAP[upper]
  if (alias) return alias

  const lower = upper.toLowerCase()
  for (const [abbrev, fullName] of Object.entries(TEAM_NAMES)) {
    const nickname = fullName.split(' ').pop() ?? ''
    if (fullName.toLowerCase() === lower || nickname.toLowerCase() === lower) {
      return abbrev
    }
  }

  // unknown teams keep their spelling so they can still use reported bye data
  return upper
}

function isPosition(value: string): value is Position {
  return POSITIONS.some((position) => position === value)
}

export function normalizePosition(raw: string | null | undefined): Position | null {
  if (!raw) return null
  const upper = raw.trim().toUpperCase()
  if (isPosition(upper)) return upper
  return POSITION_ALIASES[upper] ?? null
}

export function normalizePlayerName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9\s'-]/gi, '')
    .replace(/['-]/g, '')
    .replace(/\b(jr|sr|ii|iii|iv|v)\b/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

// Key used to merge the same player across providers.
export function playerKey(name: string, position: Position): string {
  return `${normalizePlayerName(name)}__${position}`
}
