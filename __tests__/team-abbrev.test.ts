import { describe, it, expect } from 'vitest'
import { normalizePlayerName, normalizePosition, normalizeTeamAbbrev, playerKey } from '@/lib/team-abbrev'

describe('normalizeTeamAbbrev', () => {
  it('maps aliases and names onto canonical abbreviations', () => {
    expect(normalizeTeamAbbrev('jac')).toBe('JAX')
    expect(normalizeTeamAbbrev(' WSH ')).toBe('WAS')
    expect(normalizeTeamAbbrev('Chiefs')).toBe('KC')
    expect(normalizeTeamAbbrev('buffalo bills')).toBe('BUF')
  })

  it('keeps unknown teams and rejects blanks', () => {
    expect(normalizeTeamAbbrev('xyz')).toBe('XYZ')
    expect(normalizeTeamAbbrev('')).toBeNull()
    expect(normalizeTeamAbbrev(null)).toBeNull()
  })
})

describe('normalizePosition', () => {
  it('accepts aliases and rejects unsupported positions', () => {
    expect(normalizePosition('PK')).toBe('K')
    expect(normalizePosition('dst')).toBe('DEF')
    expect(normalizePosition('wr')).toBe('WR')
    expect(normalizePosition('LB')).toBeNull()
  })
})

describe('player names', () => {
  it('strips punctuation and suffixes', () => {
    expect(normalizePlayerName('A.J. Brown')).toBe('aj brown')
    expect(normalizePlayerName('Marvin Harrison Jr.')).toBe('marvin harrison')
    expect(playerKey("Ja'Marr Chase", 'WR')).toBe('jamarr chase__WR')
  })
})
