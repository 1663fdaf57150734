export * from './common/errors';
export { loadConfig } from './common/config';
export type { AppConfig, UpscalerKind } from './common/config';
export { getDefaultWallpaperDir } from './common/paths';
export { CraiyonClient, validatePrompt } from './fetch-images/core';
export type { GeneratedImage, ImageFetcher } from './fetch-images/types';
export { ModelUpscaler, createUpscaler } from './upscale-image/core';
export { StabilityUpscaler } from './upscale-image/stability';
export type { Upscaler } from './upscale-image/types';
export { padToAspect } from './resize-image/core';
export { applyWallpaper, loadImageFile, listWallpapers, pruneWallpapers } from './set-wallpaper/core';
export { createWallpaperSetter } from './set-wallpaper/setters';
export type { WallpaperFile, WallpaperSetter } from './set-wallpaper/types';
export { generateWallpaper } from './gen-wallpaper/core';
export { DEFAULT_PROMPTS, resolvePrompt } from './gen-wallpaper/prompts';
export type { GenerateResult, PipelineDeps, PipelineOptions } from './gen-wallpaper/types';
