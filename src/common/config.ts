import { z } from 'zod';
import { ConfigError } from './errors';
import { getDefaultWallpaperDir } from './paths';

export const UPSCALER_KINDS = ['model', 'stability'] as const;
export type UpscalerKind = (typeof UPSCALER_KINDS)[number];

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

export const EnvSchema = z.object({
  CRAIYON_API_URL: z.string().url().default('https://api.craiyon.com/draw'),
  CRAIYON_IMAGE_URL: z.string().url().default('https://img.craiyon.com'),
  CRAIYON_MODEL_VERSION: z.string().min(1).default('35s5hfwn9n78gb06'),
  WALLPAPER_DIR: optionalString,
  UPSCALER: z.enum(UPSCALER_KINDS).default('model'),
  UPSCALE_BINARY: z.string().min(1).default('realesrgan-ncnn-vulkan'),
  UPSCALE_MODEL_DIR: z.string().min(1).default('models'),
  UPSCALE_MODEL_NAME: z.string().min(1).default('realesr-animevideov3'),
  STABILITY_API_KEY: optionalString,
});

export interface AppConfig {
  craiyon: {
    apiUrl: string;
    imageUrl: string;
    modelVersion: string;
  };
  wallpaperDir: string;
  upscaler: UpscalerKind;
  model: {
    binary: string;
    modelDir: string;
    modelName: string;
  };
  stabilityApiKey?: string;
}

/**
 * Read the app configuration from environment variables (already populated by dotenv)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${keys.join('; ')})`, { cause: result.error });
  }

  const parsed = result.data;
  return {
    craiyon: {
      apiUrl: parsed.CRAIYON_API_URL,
      imageUrl: parsed.CRAIYON_IMAGE_URL,
      modelVersion: parsed.CRAIYON_MODEL_VERSION,
    },
    wallpaperDir: parsed.WALLPAPER_DIR ?? getDefaultWallpaperDir(),
    upscaler: parsed.UPSCALER,
    model: {
      binary: parsed.UPSCALE_BINARY,
      modelDir: parsed.UPSCALE_MODEL_DIR,
      modelName: parsed.UPSCALE_MODEL_NAME,
    },
    stabilityApiKey: parsed.STABILITY_API_KEY,
  };
}
