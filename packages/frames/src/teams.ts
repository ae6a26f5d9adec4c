import type { Frame, Position } from './types'

export const PLAYERS_PER_TEAM = 11
export const PLAYER_COUNT = PLAYERS_PER_TEAM * 2

export type Team = 'a' | 'b'

/** Half-open player index ranges per team */
export const TEAM_RANGES: Readonly<Record<Team, readonly [start: number, end: number]>> = {
  a: [0, PLAYERS_PER_TEAM],
  b: [PLAYERS_PER_TEAM, PLAYER_COUNT],
}

export function teamOf(playerIndex: number): Team {
  return playerIndex < PLAYERS_PER_TEAM ? 'a' : 'b'
}

export function teamPlayers(frame: Frame, team: Team): readonly Position[] {
  const [start, end] = TEAM_RANGES[team]
  return frame.players.slice(start, end)
}
