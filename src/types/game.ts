// Game-related TypeScript types

export type Stone = 'black' | 'white';

// Absence of a stone is null, never a third Stone value
export type Cell = Stone | null;

export interface Point {
  x: number; // column, 0-based from the left
  y: number; // row, 0-based from the top
}

export interface GameMove {
  color: Stone;
  point: Point | null; // null = pass
}

export interface SetupStone {
  color: Stone;
  x: number;
  y: number;
}

export interface GameInfo {
  event?: string; // EV
  playerBlack?: string; // PB
  playerWhite?: string; // PW
  blackRank?: string; // BR
  whiteRank?: string; // WR
  result?: string; // RE
  date?: string; // DT
  timeLimit?: string; // TM
  overtime?: string; // OT
  komi?: string; // KM
  ruleset?: string; // RU
}

export interface GameModel {
  readonly boardSize: number;
  readonly info: Readonly<GameInfo>;
  readonly setup: readonly SetupStone[];
  readonly moves: readonly GameMove[];
}

export type BoardGrid = ReadonlyArray<ReadonlyArray<Cell>>;

export interface BoardSnapshot {
  readonly size: number;
  readonly grid: BoardGrid; // [y][x]
}

export interface MoveRef {
  color: Stone;
  x: number;
  y: number;
}

export interface CaptureCounts {
  black: number; // stones captured by Black
  white: number; // stones captured by White
}

export type PlaybackState = 'idle' | 'ready' | 'playing';

export interface PlayerSnapshot {
  board: BoardSnapshot;
  lastMove: MoveRef | null;
  currentIndex: number;
  moveCount: number;
  isPlaying: boolean;
  state: PlaybackState;
  captures: CaptureCounts;
  lastCaptureCount: number;
}

export function opponentOf(color: Stone): Stone {
  return color === 'black' ? 'white' : 'black';
}
