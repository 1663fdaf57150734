import { GeneratedImage } from '../fetch-images/types';

/**
 * Anything that can turn an image into a higher-resolution copy of itself
 */
export interface Upscaler {
  readonly name: string;
  upscale(image: GeneratedImage, scale: number): Promise<GeneratedImage>;
}

export interface ModelUpscalerConfig {
  binary: string;     // Path or name of the realesrgan-ncnn-vulkan executable
  modelDir: string;   // Directory holding <model>.param and <model>.bin
  modelName: string;
}

export interface StabilityConfig {
  apiKey: string;
}

export interface StabilityOptions {
  prompt?: string;  // Required by the API, but we'll provide a default in the implementation
  negative_prompt?: string;
  seed?: number;  // 0-4294967294
  output_format?: 'jpeg' | 'png' | 'webp';
  creativity?: number;  // 0.2-0.5
}
