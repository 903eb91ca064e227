import { loadConfig } from './config';
import type { PlayerConfig } from './config';
import { setLogLevel } from './services/logger';
import { GamePlayer } from './store/gamePlayer';

export * from './types/game';
export type { SgfNode } from './types/SgfNode';
export { DEFAULT_PLAYER_CONFIG, MIN_PLAY_INTERVAL, clampPlayInterval, loadConfig } from './config';
export type { PlayerConfig } from './config';
export { createLogger, getLogLevel, setLogLevel } from './services/logger';
export type { LogLevel, Logger } from './services/logger';
export { GameLoadError, SgfParseError } from './services/errors';
export {
  decodeSgfPoint,
  encodeSgfPoint,
  getAdjacentPoints,
  isValidPoint,
  pointToKey,
  toHumanCoordinate,
} from './services/coordinateUtils';
export { parseSgf, serializeGame } from './services/sgf';
export {
  DEFAULT_BOARD_SIZE,
  MAX_BOARD_SIZE,
  MIN_BOARD_SIZE,
  buildGameModel,
  clampBoardSize,
  loadGameModel,
  parseBoardSize,
} from './services/gameModel';
export {
  applyMove,
  calculateTerritory,
  countLiberties,
  countStones,
  createEmptyGrid,
  createSetupGrid,
  getGroup,
  getLiberties,
  isSuicide,
  replayGame,
} from './services/goLogic';
export type { MoveResult, ReplayResult } from './services/goLogic';
export { PlaybackClock } from './services/playbackClock';
export {
  FileSystemSgfSource,
  createGameRecord,
  loadGameFile,
  loadGameLibrary,
} from './services/gameLibrary';
export type { GameRecord, LibraryOptions, SgfSource } from './services/gameLibrary';
export { GamePlayer } from './store/gamePlayer';
export type {
  GameLoadedEvent,
  MoveAppliedEvent,
  PlayerEvents,
  PlayerOptions,
} from './store/gamePlayer';

/**
 * Player configured from the environment (or the given config): applies
 * the log level and the playback interval.
 */
export function createGamePlayer(config: PlayerConfig = loadConfig()): GamePlayer {
  setLogLevel(config.logLevel);
  return new GamePlayer({ playInterval: config.playInterval });
}
