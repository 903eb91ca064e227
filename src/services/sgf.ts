// SGF (Smart Game Format) utilities
// Reads the main line of a record into property-bag nodes; variations are dropped.

import type { GameInfo, GameModel, Stone } from '../types/game';
import { addProperty, createSgfNode } from '../types/SgfNode';
import type { SgfNode } from '../types/SgfNode';
import { encodeSgfPoint } from './coordinateUtils';
import { SgfParseError } from './errors';

const WHITESPACE = /\s/;
const LETTER = /[A-Za-z]/;

// Metadata fields in the order they are written back out
export const INFO_PROPERTIES: ReadonlyArray<readonly [keyof GameInfo, string]> = [
  ['event', 'EV'],
  ['playerBlack', 'PB'],
  ['playerWhite', 'PW'],
  ['blackRank', 'BR'],
  ['whiteRank', 'WR'],
  ['result', 'RE'],
  ['date', 'DT'],
  ['timeLimit', 'TM'],
  ['overtime', 'OT'],
  ['komi', 'KM'],
  ['ruleset', 'RU'],
];

/**
 * Single left-to-right scan over the record. At each tree level only the
 * first sub-tree is entered; later siblings are skipped with their content.
 */
class SgfReader {
  private readonly text: string;
  private pos = 0;
  private readonly nodes: SgfNode[] = [];

  constructor(text: string) {
    this.text = text.replace(/\r/g, '');
  }

  read(): SgfNode[] {
    this.skipWhitespace();
    if (this.peek() !== '(') {
      throw new SgfParseError(this.pos, `Missing '(' at start of game tree (position ${this.pos})`);
    }

    // One entry per open tree: whether its main-line sub-tree was entered yet
    const levels: boolean[] = [false];
    this.pos++;

    while (this.hasData() && levels.length > 0) {
      const c = this.peek();
      if (c === ';') {
        this.pos++;
        this.nodes.push(this.readNode());
      } else if (c === '(') {
        const top = levels.length - 1;
        if (!levels[top]) {
          levels[top] = true;
          levels.push(false);
          this.pos++;
        } else {
          this.skipSubtree();
        }
      } else if (c === ')') {
        levels.pop();
        this.pos++;
      } else {
        // whitespace or junk between tokens
        this.pos++;
      }
    }

    return this.nodes;
  }

  private hasData(): boolean {
    return this.pos < this.text.length;
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private skipWhitespace(): void {
    while (this.hasData() && WHITESPACE.test(this.peek())) this.pos++;
  }

  private readNode(): SgfNode {
    const node = createSgfNode();
    this.skipWhitespace();

    while (LETTER.test(this.peek())) {
      const key = this.readIdentifier();
      this.skipWhitespace();

      const values: string[] = [];
      while (this.peek() === '[') {
        values.push(this.readValue());
        this.skipWhitespace();
      }
      if (values.length > 0) addProperty(node, key, values);
    }

    return node;
  }

  private readIdentifier(): string {
    const start = this.pos;
    while (LETTER.test(this.peek())) this.pos++;
    return this.text.slice(start, this.pos).toUpperCase();
  }

  // Cursor sits on '['. Backslash takes the next character verbatim.
  private readValue(): string {
    this.pos++;
    let out = '';
    while (this.hasData()) {
      const c = this.text[this.pos];
      this.pos++;
      if (c === '\\') {
        if (this.hasData()) {
          out += this.text[this.pos];
          this.pos++;
        }
      } else if (c === ']') {
        return out;
      } else {
        out += c;
      }
    }
    return out;
  }

  // Cursor sits on '('. Bracketed values are stepped over so parens inside
  // comments do not disturb the depth count.
  private skipSubtree(): void {
    this.pos++;
    let depth = 0;
    while (this.hasData()) {
      const c = this.peek();
      if (c === '[') {
        this.readValue();
        continue;
      }
      this.pos++;
      if (c === '(') {
        depth++;
      } else if (c === ')') {
        if (depth === 0) return;
        depth--;
      }
    }
  }
}

/**
 * Parse SGF text into the main-line node sequence.
 * Throws SgfParseError only when the text does not open with '('.
 */
export function parseSgf(text: string): SgfNode[] {
  return new SgfReader(text).read();
}

function escapeValue(value: string): string {
  return value.replace(/[\]\\]/g, (ch) => `\\${ch}`);
}

function colorKey(color: Stone): 'B' | 'W' {
  return color === 'black' ? 'B' : 'W';
}

/**
 * Convert a game model to SGF text: root properties first, then one node per move.
 * Setup stones are grouped into AB then AW.
 */
export function serializeGame(model: GameModel): string {
  let sgf = `(;GM[1]FF[4]SZ[${model.boardSize}]\n`;

  for (const [field, key] of INFO_PROPERTIES) {
    const value = model.info[field];
    if (value) sgf += `${key}[${escapeValue(value)}]\n`;
  }

  for (const color of ['black', 'white'] as const) {
    const coords = model.setup
      .filter((stone) => stone.color === color)
      .map((stone) => encodeSgfPoint(stone))
      .filter((coord) => coord !== '');
    if (coords.length > 0) {
      sgf += `A${colorKey(color)}${coords.map((coord) => `[${coord}]`).join('')}\n`;
    }
  }

  let movestr = '';
  for (const move of model.moves) {
    const coord = move.point ? encodeSgfPoint(move.point) : '';
    movestr += `;${colorKey(move.color)}[${coord}]`;
  }

  sgf += movestr;
  sgf += ')';

  return sgf;
}
