import { errorMessage, FetchError, UpscaleError } from '../common/errors';
import { randomPick, validatePrompt } from '../fetch-images/core';
import { GeneratedImage } from '../fetch-images/types';
import { padToAspect } from '../resize-image/core';
import { applyWallpaper } from '../set-wallpaper/core';
import { Upscaler } from '../upscale-image/types';
import { GenerateResult, PipelineDeps, PipelineOptions } from './types';

async function upscaleImage(
  image: GeneratedImage,
  scale: number,
  upscaler: Upscaler | undefined,
  fallback: boolean
): Promise<GeneratedImage | null> {
  try {
    if (!upscaler) {
      throw new UpscaleError('Upscaling requested but no upscaler is configured');
    }
    return await upscaler.upscale(image, scale);
  } catch (error) {
    if (!fallback) throw error;
    console.warn(`Warning: upscaling failed, keeping original image: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Prompt -> fetch -> (upscale) -> (resize) -> save & set as wallpaper.
 * Stops at the first failing stage and rethrows its error.
 */
export async function generateWallpaper(
  prompt: string,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<GenerateResult> {
  const text = validatePrompt(prompt);

  console.log(`Generating image for prompt: ${text}`);
  const images = await deps.fetcher.fetchImages(text, { count: options.count });
  if (images.length === 0) {
    throw new FetchError('Service returned no images');
  }
  let image = options.pick ? options.pick(images) : randomPick(images);

  let upscaled = false;
  if (options.upscale) {
    console.log('Upscaling image...');
    const result = await upscaleImage(
      image,
      options.upscale.scale,
      deps.upscaler,
      options.upscaleFallback ?? false
    );
    if (result) {
      image = result;
      upscaled = true;
    }
  }

  let resized = false;
  if (options.resize) {
    console.log('Resizing image...');
    const result = await padToAspect(image);
    resized = result !== image;
    image = result;
  }

  console.log('Setting wallpaper...');
  const wallpaper = await applyWallpaper(image, { dir: options.dir, setter: deps.setter });
  console.log('Done.');

  return { prompt: text, wallpaper, upscaled, resized };
}
