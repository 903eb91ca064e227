import { isLogLevel } from './services/logger';
import type { LogLevel } from './services/logger';

export interface PlayerConfig {
  playInterval: number; // seconds between automatic steps
  logLevel: LogLevel;
  shuffleGameOrder: boolean;
}

export const MIN_PLAY_INTERVAL = 0.05;

export const DEFAULT_PLAYER_CONFIG: PlayerConfig = {
  playInterval: 0.75,
  logLevel: 'warn',
  shuffleGameOrder: false,
};

export function clampPlayInterval(seconds: number): number {
  if (!Number.isFinite(seconds)) return DEFAULT_PLAYER_CONFIG.playInterval;
  return Math.max(MIN_PLAY_INTERVAL, seconds);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  return fallback;
}

/**
 * Read overrides from the environment, e.g. SGF_REPLAY_PLAY_INTERVAL=0.5.
 * Anything unparsable keeps its default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlayerConfig {
  const config: PlayerConfig = { ...DEFAULT_PLAYER_CONFIG };

  const interval = env.SGF_REPLAY_PLAY_INTERVAL;
  if (interval !== undefined && interval.trim() !== '') {
    const seconds = Number(interval);
    if (Number.isFinite(seconds)) {
      config.playInterval = clampPlayInterval(seconds);
    }
  }

  const level = env.SGF_REPLAY_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logLevel = level;
  }

  config.shuffleGameOrder = parseFlag(env.SGF_REPLAY_SHUFFLE, config.shuffleGameOrder);

  return config;
}
