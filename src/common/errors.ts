/**
 * Base error for every failure the wallpaper pipeline reports.
 * The CLI prints `message` and exits non-zero; `cause` keeps the underlying error.
 */
export class WallpaperGeneratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PromptError extends WallpaperGeneratorError {}

export class ConfigError extends WallpaperGeneratorError {}

/**
 * Network or service failure while requesting images
 */
export class FetchError extends WallpaperGeneratorError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class UpscaleError extends WallpaperGeneratorError {}

export class ResizeError extends WallpaperGeneratorError {}

export class WallpaperSetError extends WallpaperGeneratorError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
