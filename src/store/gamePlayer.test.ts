import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GamePlayer } from './gamePlayer';
import { loadGameModel } from '../services/gameModel';
import { countStones } from '../services/goLogic';
import { CAPTURE_GAME, CORNER_EYE_GAME } from '../test/fixtures';

const game = loadGameModel(CAPTURE_GAME);

function loadedPlayer(playInterval = 0.5): GamePlayer {
  const player = new GamePlayer({ playInterval });
  player.load(game);
  return player;
}

describe('GamePlayer', () => {
  let player: GamePlayer;

  beforeEach(() => {
    vi.useFakeTimers();
    player = loadedPlayer();
  });

  afterEach(() => {
    player.dispose();
    vi.useRealTimers();
  });

  describe('loading', () => {
    it('starts at the setup position', () => {
      expect(player.state).toBe('ready');
      expect(player.currentIndex).toBe(0);
      expect(player.maxIndex).toBe(12);
      expect(player.boardSize).toBe(9);
      expect(player.board.size).toBe(9);
      expect(countStones(player.board.grid)).toBe(0);
      expect(player.lastMove).toBeNull();
      expect(player.gameInfo).toEqual({ playerBlack: 'Alpha', playerWhite: 'Beta' });
    });

    it('places setup stones that fit the board', () => {
      player.load(loadGameModel('(;SZ[9]AB[aa][zz])'));

      expect(countStones(player.board.grid)).toBe(1);
      expect(player.board.grid[0][0]).toBe('black');
    });

    it('announces the loaded game', () => {
      const onLoaded = vi.fn();
      player.events.on('loaded', onLoaded);

      player.load(game);

      expect(onLoaded).toHaveBeenCalledWith({ moveCount: 12, boardSize: 9 });
    });

    it('clears to an empty board of the last size', () => {
      player.seek(5);
      player.clear();

      expect(player.state).toBe('idle');
      expect(player.boardSize).toBe(9);
      expect(player.maxIndex).toBe(0);
      expect(player.gameInfo).toEqual({});
      expect(countStones(player.board.grid)).toBe(0);
    });
  });

  describe('stepping', () => {
    it('captures, credits a suicide to the opponent, and treats odd moves as passes', () => {
      player.seek(6);
      player.stepForward();

      expect(player.lastCaptureCount).toBe(1);
      expect(player.captures).toEqual({ black: 1, white: 0 });
      expect(player.board.grid[2][3]).toBeNull();

      player.stepForward();

      expect(player.lastMove).toEqual({ color: 'white', x: 3, y: 2 });
      expect(player.board.grid[2][3]).toBeNull();
      expect(player.lastCaptureCount).toBe(0);
      expect(player.captures).toEqual({ black: 2, white: 0 });

      const beforePass = player.board.grid;
      player.stepForward();

      expect(player.currentIndex).toBe(9);
      expect(player.lastMove).toBeNull();
      expect(player.board.grid).toEqual(beforePass);

      player.seek(11);

      expect(player.lastMove).toBeNull();
      expect(player.lastCaptureCount).toBe(0);
    });

    it('adds a suicided stone to the other color', () => {
      player.load(loadGameModel('(;SZ[9]AW[ba][ab];B[aa])'));
      player.stepForward();

      expect(player.board.grid[0][0]).toBeNull();
      expect(player.captures).toEqual({ black: 0, white: 1 });
      expect(player.lastCaptureCount).toBe(0);

      player.stepBack();
      player.seek(1);
      expect(player.captures).toEqual({ black: 0, white: 1 });
    });

    it('ends with four stones of each color', () => {
      player.seek(12);

      expect(countStones(player.board.grid)).toBe(8);
      expect(player.lastMove).toEqual({ color: 'white', x: 5, y: 6 });
    });

    it('reaches the same position by seeking or stepping', () => {
      player.seek(10);
      const direct = player.snapshot;

      player.seek(3);
      player.seek(10);
      expect(player.snapshot).toEqual(direct);

      const stepped = loadedPlayer();
      for (let i = 0; i < 10; i++) stepped.stepForward();
      expect(stepped.snapshot).toEqual(direct);
      stepped.dispose();
    });

    it('clamps seek targets', () => {
      player.seek(-5);
      expect(player.currentIndex).toBe(0);
      player.seek(99);
      expect(player.currentIndex).toBe(12);
      player.seek(Number.NaN);
      expect(player.currentIndex).toBe(0);
      player.seek(2.7);
      expect(player.currentIndex).toBe(2);
    });

    it('does nothing at either end while paused', () => {
      const onFinished = vi.fn();
      player.events.on('finished', onFinished);

      const start = player.board;
      expect(player.stepBack()).toBe(start);

      player.seek(12);
      const end = player.board;
      expect(player.stepForward()).toBe(end);
      expect(onFinished).not.toHaveBeenCalled();
    });

    it('resets idempotently', () => {
      player.seek(7);
      player.reset();
      const first = player.snapshot;
      player.reset();

      expect(player.snapshot).toEqual(first);
      expect(first.currentIndex).toBe(0);
      expect(first.captures).toEqual({ black: 0, white: 0 });
    });

    it('reports each applied move', () => {
      const onMove = vi.fn();
      player.events.on('move', onMove);

      player.stepForward();

      expect(onMove).toHaveBeenCalledWith({
        index: 0,
        move: { color: 'black', point: { x: 2, y: 2 } },
        captured: 0,
      });
    });
  });

  describe('playback', () => {
    it('moves through the states', () => {
      const idle = new GamePlayer();
      idle.play();
      expect(idle.state).toBe('idle');
      idle.dispose();

      player.play();
      expect(player.state).toBe('playing');
      player.togglePlay();
      expect(player.state).toBe('ready');
      player.togglePlay();
      expect(player.state).toBe('playing');
      player.pause();
      expect(player.state).toBe('ready');
    });

    it('advances once per interval and finishes once', () => {
      const onFinished = vi.fn();
      player.events.on('finished', onFinished);

      player.play();
      vi.advanceTimersByTime(500 * 12);

      expect(player.currentIndex).toBe(12);
      expect(player.isPlaying).toBe(true);
      expect(onFinished).not.toHaveBeenCalled();

      vi.advanceTimersByTime(500);

      expect(player.isPlaying).toBe(false);
      expect(onFinished).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(5000);
      expect(onFinished).toHaveBeenCalledTimes(1);
    });

    it('restarts the timer when the interval changes', () => {
      player.play();
      vi.advanceTimersByTime(400);
      player.setPlayInterval(1);
      vi.advanceTimersByTime(400);

      expect(player.currentIndex).toBe(0);

      vi.advanceTimersByTime(600);
      expect(player.currentIndex).toBe(1);
    });

    it('clamps the interval', () => {
      player.setPlayInterval(0);
      expect(player.playInterval).toBe(0.05);
    });

    it('drops pending ticks when a new game loads', () => {
      player.play();
      vi.advanceTimersByTime(500);
      expect(player.currentIndex).toBe(1);

      player.load(game);
      vi.advanceTimersByTime(5000);

      expect(player.isPlaying).toBe(false);
      expect(player.currentIndex).toBe(0);
    });

    it('keeps playing after a step back', () => {
      player.play();
      vi.advanceTimersByTime(1500);
      player.stepBack();

      expect(player.currentIndex).toBe(2);
      expect(player.isPlaying).toBe(true);

      vi.advanceTimersByTime(500);
      expect(player.currentIndex).toBe(3);
    });

    it('stops when seeking', () => {
      player.play();
      player.seek(4);

      expect(player.isPlaying).toBe(false);
      vi.advanceTimersByTime(2000);
      expect(player.currentIndex).toBe(4);
    });
  });

  describe('live moves', () => {
    it('appends an optimistic move at the end', () => {
      player.seek(12);
      const board = player.playMoveOptimistically('black', 0, 0);

      expect(board.grid[0][0]).toBe('black');
      expect(player.currentIndex).toBe(13);
      expect(player.maxIndex).toBe(13);
    });

    it('catches up before an optimistic move from an earlier position', () => {
      player.seek(3);
      player.playMoveOptimistically('black', 8, 8);

      expect(player.currentIndex).toBe(13);
      expect(player.captures).toEqual({ black: 2, white: 0 });
      expect(countStones(player.board.grid)).toBe(9);
    });

    it('accepts an optimistic move with no game loaded', () => {
      const fresh = new GamePlayer();
      fresh.playMoveOptimistically('white', 3, 3);

      expect(fresh.state).toBe('ready');
      expect(fresh.boardSize).toBe(19);
      expect(fresh.currentIndex).toBe(1);
      expect(fresh.turn).toBe('black');
      fresh.dispose();
    });

    it('applies remote moves only in sequence', () => {
      expect(player.turn).toBe('black');

      expect(player.applyRemoteMove('black', { x: 0, y: 0 }, 13)).toBe(true);
      expect(player.applyRemoteMove('white', { x: 1, y: 0 }, 13)).toBe(false);
      expect(player.maxIndex).toBe(13);

      expect(player.applyRemoteMove('white', null, 14)).toBe(true);
      expect(player.lastMove).toBeNull();
      expect(player.currentIndex).toBe(14);
      expect(player.turn).toBe('black');
    });
  });

  describe('starting positions', () => {
    it('takes the side to move from the record', () => {
      expect(player.turn).toBe('black');

      player.load(loadGameModel('(;SZ[9]AB[cc][gg];W[ee])'));
      expect(player.turn).toBe('white');

      player.clear();
      expect(player.turn).toBe('black');
    });

    it('loads a bare position with the given side to move', () => {
      const onLoaded = vi.fn();
      player.events.on('loaded', onLoaded);
      player.play();
      vi.advanceTimersByTime(500);

      player.loadPosition(9, [{ color: 'black', x: 2, y: 2 }, { color: 'black', x: 6, y: 6 }], 'white');
      vi.advanceTimersByTime(5000);

      expect(player.isPlaying).toBe(false);
      expect(player.state).toBe('ready');
      expect(player.currentIndex).toBe(0);
      expect(player.maxIndex).toBe(0);
      expect(player.turn).toBe('white');
      expect(countStones(player.board.grid)).toBe(2);
      expect(player.gameInfo).toEqual({});
      expect(onLoaded).toHaveBeenLastCalledWith({ moveCount: 0, boardSize: 9 });

      expect(player.applyRemoteMove('white', { x: 4, y: 4 }, 1)).toBe(true);
      expect(player.turn).toBe('black');
      expect(player.board.grid[4][4]).toBe('white');

      player.reset();
      expect(player.turn).toBe('white');
    });
  });

  describe('board queries', () => {
    beforeEach(() => {
      player.load(loadGameModel(CORNER_EYE_GAME));
    });

    it('spots suicide without changing the board', () => {
      expect(player.isSuicide('white', 0, 0)).toBe(true);
      expect(player.isSuicide('black', 0, 0)).toBe(false);
      expect(player.board.grid[0][0]).toBeNull();
      expect(countStones(player.board.grid)).toBe(8);
    });

    it('scores territory on the current position', () => {
      player.stepForward();
      const territory = player.calculateTerritory();

      expect(territory[0][1]).toBe('black');
      expect(territory[1][1]).toBe('black');
      expect(territory[0][0]).toBeNull();
      // only black stones remain, so the open board is black's too
      expect(territory[8][8]).toBe('black');
    });
  });

  describe('observers', () => {
    it('notifies subscribers once per action', () => {
      const listener = vi.fn();
      const unsubscribe = player.subscribe(listener);

      player.seek(3);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({ currentIndex: 3, moveCount: 12, state: 'ready' });

      unsubscribe();
      player.stepForward();
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('detaches everything on dispose', () => {
      const listener = vi.fn();
      player.subscribe(listener);
      player.events.on('finished', vi.fn());
      player.play();

      player.dispose();

      expect(player.isPlaying).toBe(false);
      expect(player.events.listenerCount('finished')).toBe(0);
      player.seek(3);
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });
});
