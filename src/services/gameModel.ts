// Folds main-line SGF nodes into a playable game model

import type { GameInfo, GameModel, GameMove, SetupStone, Stone } from '../types/game';
import type { SgfNode } from '../types/SgfNode';
import { decodeSgfPoint } from './coordinateUtils';
import { INFO_PROPERTIES, parseSgf } from './sgf';

export const DEFAULT_BOARD_SIZE = 19;
export const MIN_BOARD_SIZE = 2;
export const MAX_BOARD_SIZE = 25;

const INFO_FIELD_BY_KEY = new Map<string, keyof GameInfo>(
  INFO_PROPERTIES.map(([field, key]) => [key, field])
);

function parseInteger(value: string): number | null {
  return /^[+-]?\d+$/.test(value) ? Number(value) : null;
}

export function clampBoardSize(size: number): number {
  return Math.max(MIN_BOARD_SIZE, Math.min(MAX_BOARD_SIZE, size));
}

/**
 * SZ value to a square board size. 'W:H' keeps the smaller side.
 * Returns null when the value is not a number at all.
 */
export function parseBoardSize(value: string): number | null {
  const colon = value.indexOf(':');
  if (colon >= 0) {
    const left = parseInteger(value.slice(0, colon)) ?? DEFAULT_BOARD_SIZE;
    const right = parseInteger(value.slice(colon + 1)) ?? left;
    return clampBoardSize(Math.min(left, right));
  }

  const size = parseInteger(value);
  return size === null ? null : clampBoardSize(size);
}

/**
 * Build a game model from parsed nodes. Never fails: unknown keys are
 * ignored, bad coordinates dropped, and the first usable value of each
 * scalar property wins.
 */
export function buildGameModel(nodes: readonly SgfNode[]): GameModel {
  let boardSize: number | null = null;
  const info: GameInfo = {};
  const setup: SetupStone[] = [];
  const moves: GameMove[] = [];

  const addSetup = (color: Stone, values: string[]): void => {
    for (const value of values) {
      const point = decodeSgfPoint(value);
      if (point) setup.push({ color, x: point.x, y: point.y });
    }
  };

  for (const node of nodes) {
    for (const [key, values] of Object.entries(node.properties)) {
      const first = values[0] ?? '';

      switch (key) {
        case 'SZ':
          if (boardSize === null) boardSize = parseBoardSize(first);
          break;
        case 'AB':
          addSetup('black', values);
          break;
        case 'AW':
          addSetup('white', values);
          break;
        case 'B':
          moves.push({ color: 'black', point: decodeSgfPoint(first) });
          break;
        case 'W':
          moves.push({ color: 'white', point: decodeSgfPoint(first) });
          break;
        default: {
          const field = INFO_FIELD_BY_KEY.get(key);
          const text = values.find((value) => value !== '');
          if (field && text !== undefined && info[field] === undefined) {
            info[field] = text;
          }
        }
      }
    }
  }

  return Object.freeze({
    boardSize: boardSize ?? DEFAULT_BOARD_SIZE,
    info: Object.freeze(info),
    setup: Object.freeze(setup),
    moves: Object.freeze(moves),
  });
}

/**
 * Parse SGF text straight into a game model
 */
export function loadGameModel(text: string): GameModel {
  return buildGameModel(parseSgf(text));
}
