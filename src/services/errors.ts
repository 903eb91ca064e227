// Typed failures surfaced to callers

export class SgfParseError extends Error {
  position: number;

  constructor(position: number, message: string) {
    super(message);
    this.name = 'SgfParseError';
    this.position = position;
  }
}

export class GameLoadError extends Error {
  source: string;

  constructor(source: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'GameLoadError';
    this.source = source;
  }
}
