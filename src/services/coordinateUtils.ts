import type { Point } from '../types/game';

// SGF coordinate system: 'a' = 0, two letters per point (column, row)
const SGF_COORD_LETTERS = 'abcdefghijklmnopqrstuvwxyz';
// Human coordinate system skips I
const HUMAN_COORD_LETTERS = 'ABCDEFGHJKLMNOPQRSTUVWXYZ';

/**
 * Convert SGF coordinates to a board point
 * e.g., 'pd' -> { x: 15, y: 3 }. Anything that is not exactly two
 * lowercase letters (including the empty pass value) yields null.
 */
export function decodeSgfPoint(value: string): Point | null {
  if (value.length !== 2) return null;

  const x = value.charCodeAt(0) - 97;
  const y = value.charCodeAt(1) - 97;
  if (x < 0 || y < 0 || x > 25 || y > 25) return null;

  return { x, y };
}

/**
 * Convert a board point to SGF coordinates, '' when not representable
 */
export function encodeSgfPoint(point: Point): string {
  const colChar = SGF_COORD_LETTERS[point.x];
  const rowChar = SGF_COORD_LETTERS[point.y];
  if (!Number.isInteger(point.x) || !Number.isInteger(point.y) || !colChar || !rowChar) {
    return '';
  }
  return colChar + rowChar;
}

export function isValidPoint(point: Point, boardSize: number): boolean {
  return point.x >= 0 && point.x < boardSize && point.y >= 0 && point.y < boardSize;
}

export function pointToKey(point: Point): string {
  return `${point.x},${point.y}`;
}

/**
 * Get orthogonally adjacent points that lie on the board
 */
export function getAdjacentPoints(point: Point, boardSize: number): Point[] {
  const { x, y } = point;
  const adjacent: Point[] = [];

  if (x > 0) adjacent.push({ x: x - 1, y });
  if (x < boardSize - 1) adjacent.push({ x: x + 1, y });
  if (y > 0) adjacent.push({ x, y: y - 1 });
  if (y < boardSize - 1) adjacent.push({ x, y: y + 1 });

  return adjacent;
}

/**
 * Convert a board point to human notation
 * e.g., { x: 3, y: 15 } on 19x19 -> 'D4' (rows count up from the bottom)
 */
export function toHumanCoordinate(point: Point, boardSize: number): string {
  if (!isValidPoint(point, boardSize)) return '';
  return HUMAN_COORD_LETTERS[point.x] + String(boardSize - point.y);
}
