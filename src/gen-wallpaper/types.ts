import { GeneratedImage, ImageFetcher } from '../fetch-images/types';
import { WallpaperFile, WallpaperSetter } from '../set-wallpaper/types';
import { Upscaler } from '../upscale-image/types';

export interface PipelineDeps {
  fetcher: ImageFetcher;
  setter: WallpaperSetter;
  upscaler?: Upscaler;
}

export interface PipelineOptions {
  dir: string;
  count?: number;
  upscale?: { scale: number };   // Omit to keep the fetched resolution
  upscaleFallback?: boolean;     // Continue with the original image if upscaling fails
  resize?: boolean;              // Pad to 6:4
  pick?: (images: GeneratedImage[]) => GeneratedImage;
}

export interface GenerateResult {
  prompt: string;
  wallpaper: WallpaperFile;
  upscaled: boolean;
  resized: boolean;
}
