// Go game logic - capture detection and liberty counting

import { opponentOf } from '../types/game';
import type {
  BoardGrid,
  BoardSnapshot,
  CaptureCounts,
  Cell,
  GameMove,
  MoveRef,
  Point,
  SetupStone,
  Stone,
} from '../types/game';
import { getAdjacentPoints, isValidPoint, pointToKey } from './coordinateUtils';

export function createEmptyGrid(boardSize: number): Cell[][] {
  return Array.from({ length: boardSize }, () => Array<Cell>(boardSize).fill(null));
}

export function cloneGrid(grid: BoardGrid): Cell[][] {
  return grid.map((row) => row.slice());
}

/**
 * Starting position: setup stones in order, later ones overwriting earlier.
 * Stones outside the board are skipped.
 */
export function createSetupGrid(boardSize: number, setup: readonly SetupStone[]): Cell[][] {
  const grid = createEmptyGrid(boardSize);
  for (const stone of setup) {
    if (isValidPoint(stone, boardSize)) {
      grid[stone.y][stone.x] = stone.color;
    }
  }
  return grid;
}

export function countStones(grid: BoardGrid): number {
  let count = 0;
  for (const row of grid) {
    for (const cell of row) {
      if (cell !== null) count++;
    }
  }
  return count;
}

/**
 * Find all stones in a connected group of the same color
 * Uses flood-fill algorithm
 */
export function getGroup(grid: BoardGrid, point: Point): Point[] {
  const boardSize = grid.length;
  const color = grid[point.y]?.[point.x] ?? null;
  if (color === null) return [];

  const group: Point[] = [];
  const visited = new Set<string>();
  const queue: Point[] = [point];

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    const currentKey = pointToKey(current);
    if (visited.has(currentKey)) continue;
    visited.add(currentKey);

    if (grid[current.y][current.x] !== color) continue;
    group.push(current);

    for (const adj of getAdjacentPoints(current, boardSize)) {
      if (!visited.has(pointToKey(adj)) && grid[adj.y][adj.x] === color) {
        queue.push(adj);
      }
    }
  }

  return group;
}

/**
 * Empty points orthogonally adjacent to any stone of the group
 */
export function getLiberties(grid: BoardGrid, group: readonly Point[]): Point[] {
  const boardSize = grid.length;
  const liberties = new Map<string, Point>();

  for (const point of group) {
    for (const adj of getAdjacentPoints(point, boardSize)) {
      if (grid[adj.y][adj.x] === null) {
        liberties.set(pointToKey(adj), adj);
      }
    }
  }

  return [...liberties.values()];
}

export function countLiberties(grid: BoardGrid, group: readonly Point[]): number {
  return getLiberties(grid, group).length;
}

export interface MoveResult {
  grid: Cell[][];
  captured: Point[]; // opponent stones removed by this move
  selfCaptured: Point[]; // own stones removed when the move had no liberties
  lastMove: MoveRef | null; // null for a pass or an off-board point
}

/**
 * Apply one move to a copy of the grid. Nothing is rejected: occupied
 * points are overwritten, and a move that captures nothing and leaves its
 * own group without liberties removes that group. Stones in `selfCaptured`
 * count as captured by the opponent.
 */
export function applyMove(grid: BoardGrid, move: GameMove): MoveResult {
  const boardSize = grid.length;
  const next = cloneGrid(grid);
  const point = move.point;

  if (!point || !isValidPoint(point, boardSize)) {
    return { grid: next, captured: [], selfCaptured: [], lastMove: null };
  }

  next[point.y][point.x] = move.color;

  const opponent = opponentOf(move.color);
  const captured: Point[] = [];
  const checked = new Set<string>();

  for (const adj of getAdjacentPoints(point, boardSize)) {
    if (next[adj.y][adj.x] !== opponent || checked.has(pointToKey(adj))) continue;

    const opponentGroup = getGroup(next, adj);
    opponentGroup.forEach((p) => checked.add(pointToKey(p)));

    if (countLiberties(next, opponentGroup) === 0) {
      for (const p of opponentGroup) {
        next[p.y][p.x] = null;
        captured.push(p);
      }
    }
  }

  let selfCaptured: Point[] = [];
  if (captured.length === 0) {
    const ownGroup = getGroup(next, point);
    if (countLiberties(next, ownGroup) === 0) {
      for (const p of ownGroup) next[p.y][p.x] = null;
      selfCaptured = ownGroup;
    }
  }

  return {
    grid: next,
    captured,
    selfCaptured,
    lastMove: { color: move.color, x: point.x, y: point.y },
  };
}

/**
 * Check if placing a stone would be suicide (no liberties, no captures).
 * Occupied and off-board points never are.
 */
export function isSuicide(grid: BoardGrid, color: Stone, point: Point): boolean {
  if (!isValidPoint(point, grid.length) || grid[point.y][point.x] !== null) {
    return false;
  }
  return applyMove(grid, { color, point }).selfCaptured.length > 0;
}

/**
 * Owner of every empty point after removing `deadStones`: a region of
 * connected empty points belongs to a color when only that color borders
 * it. Neutral points and stones are null.
 */
export function calculateTerritory(grid: BoardGrid, deadStones: readonly Point[] = []): Cell[][] {
  const boardSize = grid.length;
  const board = cloneGrid(grid);
  for (const stone of deadStones) {
    if (isValidPoint(stone, boardSize)) board[stone.y][stone.x] = null;
  }

  const territory = createEmptyGrid(boardSize);
  const visited = new Set<string>();

  for (let y = 0; y < boardSize; y++) {
    for (let x = 0; x < boardSize; x++) {
      const start = { x, y };
      if (board[y][x] !== null || visited.has(pointToKey(start))) continue;

      const region: Point[] = [];
      const borders = new Set<Stone>();
      const queue: Point[] = [start];
      visited.add(pointToKey(start));

      for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
        region.push(current);
        for (const adj of getAdjacentPoints(current, boardSize)) {
          const cell = board[adj.y][adj.x];
          if (cell !== null) {
            borders.add(cell);
          } else if (!visited.has(pointToKey(adj))) {
            visited.add(pointToKey(adj));
            queue.push(adj);
          }
        }
      }

      if (borders.size === 1) {
        const [owner] = borders;
        for (const p of region) territory[p.y][p.x] = owner;
      }
    }
  }

  return territory;
}

export interface ReplayResult {
  board: BoardSnapshot;
  lastMove: MoveRef | null;
  lastCaptureCount: number;
  captures: CaptureCounts;
}

/**
 * Rebuild the position after the first `count` moves, starting from setup.
 * Capture totals are recomputed from scratch.
 */
export function replayGame(
  boardSize: number,
  setup: readonly SetupStone[],
  moves: readonly GameMove[],
  count: number
): ReplayResult {
  let grid = createSetupGrid(boardSize, setup);
  let lastMove: MoveRef | null = null;
  let lastCaptureCount = 0;
  const captures: CaptureCounts = { black: 0, white: 0 };

  const end = Math.max(0, Math.min(count, moves.length));
  for (let i = 0; i < end; i++) {
    const move = moves[i];
    const result = applyMove(grid, move);
    grid = result.grid;
    lastMove = result.lastMove;
    lastCaptureCount = result.captured.length;
    captures[move.color] += result.captured.length;
    captures[opponentOf(move.color)] += result.selfCaptured.length;
  }

  return {
    board: { size: boardSize, grid },
    lastMove,
    lastCaptureCount,
    captures,
  };
}
