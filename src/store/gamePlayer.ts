import { makeObservable, observable, computed, action, reaction } from 'mobx';
import type { IReactionDisposer } from 'mobx';
import { EventEmitter } from 'eventemitter3';
import { opponentOf } from '../types/game';
import type {
  BoardSnapshot,
  CaptureCounts,
  Cell,
  GameInfo,
  GameModel,
  GameMove,
  MoveRef,
  PlaybackState,
  PlayerSnapshot,
  Point,
  SetupStone,
  Stone,
} from '../types/game';
import { DEFAULT_PLAYER_CONFIG, clampPlayInterval } from '../config';
import type { PlayerConfig } from '../config';
import {
  applyMove,
  calculateTerritory,
  createEmptyGrid,
  isSuicide,
  replayGame,
} from '../services/goLogic';
import { DEFAULT_BOARD_SIZE, clampBoardSize } from '../services/gameModel';
import { PlaybackClock } from '../services/playbackClock';
import { createLogger } from '../services/logger';

export interface MoveAppliedEvent {
  index: number; // position of the move in the move list
  move: GameMove;
  captured: number;
}

export interface GameLoadedEvent {
  moveCount: number;
  boardSize: number;
}

export interface PlayerEvents {
  finished: () => void;
  move: (event: MoveAppliedEvent) => void;
  loaded: (event: GameLoadedEvent) => void;
}

export type PlayerOptions = Partial<Pick<PlayerConfig, 'playInterval'>>;

type ObservedPrivateFields =
  | 'moveList'
  | 'setupStones'
  | 'loadedInfo'
  | 'size'
  | 'hasGame'
  | 'initialPlayer';

const log = createLogger('player');

/**
 * Replays one game at a time. Every board change is a fold over
 * (setup, moves[0..<currentIndex]); stepping back and seeking rebuild
 * from the setup position rather than undoing moves.
 */
export class GamePlayer {
  // Published state
  board: BoardSnapshot;
  lastMove: MoveRef | null = null;
  isPlaying: boolean = false;
  currentIndex: number = 0; // number of moves applied (0…maxIndex)
  lastCaptureCount: number = 0; // stones captured by the most recent move
  blackCaptured: number = 0; // total stones captured by black
  whiteCaptured: number = 0; // total stones captured by white
  playInterval: number; // seconds per move while playing

  readonly events = new EventEmitter<PlayerEvents>();

  // Loaded game, owned exclusively by the player
  private moveList: readonly GameMove[] = [];
  private setupStones: readonly SetupStone[] = [];
  private loadedInfo: Readonly<GameInfo> = {};
  private size: number = DEFAULT_BOARD_SIZE;
  private hasGame: boolean = false;
  private initialPlayer: Stone = 'black'; // to move at position 0

  private readonly clock: PlaybackClock;
  private readonly subscriptions = new Set<IReactionDisposer>();

  constructor(options: PlayerOptions = {}) {
    this.playInterval = clampPlayInterval(options.playInterval ?? DEFAULT_PLAYER_CONFIG.playInterval);
    this.board = { size: this.size, grid: createEmptyGrid(this.size) };
    this.clock = new PlaybackClock(() => this.stepForward());

    makeObservable<GamePlayer, ObservedPrivateFields>(this, {
      // Observable properties
      board: observable.ref,
      lastMove: observable.ref,
      isPlaying: observable,
      currentIndex: observable,
      lastCaptureCount: observable,
      blackCaptured: observable,
      whiteCaptured: observable,
      playInterval: observable,
      moveList: observable.ref,
      setupStones: observable.ref,
      loadedInfo: observable.ref,
      size: observable,
      hasGame: observable,
      initialPlayer: observable,

      // Computed properties
      moves: computed,
      setup: computed,
      gameInfo: computed,
      boardSize: computed,
      maxIndex: computed,
      state: computed,
      captures: computed,
      turn: computed,
      snapshot: computed,

      // Actions
      load: action,
      loadPosition: action,
      reset: action,
      clear: action,
      stepForward: action,
      stepBack: action,
      seek: action,
      play: action,
      pause: action,
      togglePlay: action,
      setPlayInterval: action,
      playMoveOptimistically: action,
      applyRemoteMove: action,
      dispose: action,
    });
  }

  // Computed properties

  get moves(): readonly GameMove[] {
    return this.moveList;
  }

  get setup(): readonly SetupStone[] {
    return this.setupStones;
  }

  get gameInfo(): Readonly<GameInfo> {
    return this.loadedInfo;
  }

  get boardSize(): number {
    return this.size;
  }

  get maxIndex(): number {
    return this.moveList.length;
  }

  get state(): PlaybackState {
    if (this.isPlaying) return 'playing';
    return this.hasGame ? 'ready' : 'idle';
  }

  get captures(): CaptureCounts {
    return { black: this.blackCaptured, white: this.whiteCaptured };
  }

  // Color to move next; a pass counts as a move
  get turn(): Stone {
    if (this.currentIndex > 0) {
      return opponentOf(this.moveList[this.currentIndex - 1].color);
    }
    return this.initialPlayer;
  }

  get snapshot(): PlayerSnapshot {
    return {
      board: this.board,
      lastMove: this.lastMove,
      currentIndex: this.currentIndex,
      moveCount: this.moveList.length,
      isPlaying: this.isPlaying,
      state: this.state,
      captures: this.captures,
      lastCaptureCount: this.lastCaptureCount,
    };
  }

  // Actions

  load = (model: GameModel): void => {
    // The timer goes first so no tick can land on the new move list
    this.clock.stop();
    this.isPlaying = false;

    this.size = clampBoardSize(model.boardSize);
    this.setupStones = [...model.setup];
    this.moveList = [...model.moves];
    this.loadedInfo = { ...model.info };
    this.initialPlayer = model.moves[0]?.color ?? 'black';
    this.hasGame = true;

    log.debug(
      `load: board ${this.size}, ${this.moveList.length} moves, ${this.setupStones.length} setup stones`
    );

    this.rebuild(0);
    this.events.emit('loaded', { moveCount: this.moveList.length, boardSize: this.size });
  };

  /**
   * Start a live game from a bare position: no moves yet, `nextPlayer` to
   * move. Moves then arrive through applyRemoteMove.
   */
  loadPosition = (size: number, setup: readonly SetupStone[], nextPlayer: Stone): void => {
    this.clock.stop();
    this.isPlaying = false;

    this.size = clampBoardSize(size);
    this.setupStones = [...setup];
    this.moveList = [];
    this.loadedInfo = {};
    this.initialPlayer = nextPlayer;
    this.hasGame = true;

    log.debug(`loadPosition: board ${this.size}, ${setup.length} setup stones, ${nextPlayer} to move`);

    this.rebuild(0);
    this.events.emit('loaded', { moveCount: 0, boardSize: this.size });
  };

  reset = (): BoardSnapshot => {
    this.pause();
    this.rebuild(0);
    return this.board;
  };

  // Empty board of the last known size, no game loaded
  clear = (): void => {
    this.pause();
    this.setupStones = [];
    this.moveList = [];
    this.loadedInfo = {};
    this.initialPlayer = 'black';
    this.hasGame = false;
    this.rebuild(0);
  };

  stepForward = (): BoardSnapshot => {
    if (this.currentIndex >= this.moveList.length) {
      if (this.isPlaying) {
        this.pause();
        this.events.emit('finished');
      }
      return this.board;
    }

    this.applyNext();
    return this.board;
  };

  stepBack = (): BoardSnapshot => {
    if (this.currentIndex === 0) return this.board;
    this.rebuild(this.currentIndex - 1);
    return this.board;
  };

  seek = (target: number): BoardSnapshot => {
    const clamped = Math.max(0, Math.min(Math.trunc(target) || 0, this.moveList.length));
    log.debug(`seek: ${target} (clamped ${clamped}) of ${this.moveList.length}`);

    this.pause();
    this.rebuild(clamped);
    return this.board;
  };

  play = (): void => {
    if (this.isPlaying) return;
    if (!this.hasGame) {
      log.debug('play: no game loaded');
      return;
    }
    this.isPlaying = true;
    this.clock.start(this.playInterval);
  };

  pause = (): void => {
    this.isPlaying = false;
    this.clock.stop();
  };

  togglePlay = (): void => {
    if (this.isPlaying) {
      this.pause();
    } else {
      this.play();
    }
  };

  // Restarts an active timer at the new interval; position is untouched
  setPlayInterval = (seconds: number): void => {
    this.playInterval = clampPlayInterval(seconds);
    if (this.isPlaying) {
      this.clock.start(this.playInterval);
    }
  };

  /**
   * Show a locally played move before the authoritative record arrives.
   * The next load() replaces it wholesale.
   */
  playMoveOptimistically = (color: Stone, x: number, y: number): BoardSnapshot => {
    log.debug(`optimistic: ${color} at (${x}, ${y})`);
    this.appendAndApply({ color, point: { x, y } });
    return this.board;
  };

  /**
   * Live-play entry for moves decoded by a remote source. `moveNumber` is
   * 1-based and must be the next one in sequence, otherwise the move is
   * dropped and false returned.
   */
  applyRemoteMove = (color: Stone, point: Point | null, moveNumber: number): boolean => {
    const expected = this.moveList.length + 1;
    if (moveNumber !== expected) {
      log.warn(`rejecting out-of-order move ${moveNumber} (expected ${expected})`);
      return false;
    }
    this.appendAndApply({ color, point: point ? { x: point.x, y: point.y } : null });
    return true;
  };

  // Queries on the current board

  isSuicide(color: Stone, x: number, y: number): boolean {
    return isSuicide(this.board.grid, color, { x, y });
  }

  calculateTerritory(deadStones: readonly Point[] = []): Cell[][] {
    return calculateTerritory(this.board.grid, deadStones);
  }

  subscribe = (listener: (snapshot: PlayerSnapshot) => void): (() => void) => {
    const disposer = reaction(() => this.snapshot, (snapshot) => listener(snapshot));
    this.subscriptions.add(disposer);
    return () => {
      disposer();
      this.subscriptions.delete(disposer);
    };
  };

  dispose = (): void => {
    this.pause();
    this.subscriptions.forEach((disposer) => disposer());
    this.subscriptions.clear();
    this.events.removeAllListeners();
  };

  // Helpers (called only from actions)

  private rebuild(target: number): void {
    const result = replayGame(this.size, this.setupStones, this.moveList, target);
    this.board = result.board;
    this.lastMove = result.lastMove;
    this.lastCaptureCount = result.lastCaptureCount;
    this.blackCaptured = result.captures.black;
    this.whiteCaptured = result.captures.white;
    this.currentIndex = Math.min(target, this.moveList.length);
  }

  private applyNext(): void {
    const index = this.currentIndex;
    const move = this.moveList[index];
    const result = applyMove(this.board.grid, move);

    this.board = { size: this.size, grid: result.grid };
    this.lastMove = result.lastMove;
    this.lastCaptureCount = result.captured.length;
    // A suicide credits the opponent
    if (move.color === 'black') {
      this.blackCaptured += result.captured.length;
      this.whiteCaptured += result.selfCaptured.length;
    } else {
      this.whiteCaptured += result.captured.length;
      this.blackCaptured += result.selfCaptured.length;
    }
    this.currentIndex = index + 1;

    this.events.emit('move', { index, move, captured: result.captured.length });
  }

  private appendAndApply(move: GameMove): void {
    const previousCount = this.moveList.length;
    // Viewing an earlier position: catch up so the new move lands on the latest board
    if (this.currentIndex !== previousCount) {
      this.rebuild(previousCount);
    }
    this.moveList = [...this.moveList, move];
    this.hasGame = true;
    this.applyNext();
  }
}
