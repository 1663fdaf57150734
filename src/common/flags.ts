import { InvalidArgumentError } from 'commander';

export const FLAGS = {
  count: {
    flag: "-n, --count <count>",
    description: "Maximum number of images to request from the service",
  },
  scale: {
    flag: "-s, --scale <scale>",
    description: "Upscale factor, e.g. '4'",
  },
  noUpscale: {
    flag: "--no-upscale",
    description: "Use the fetched image as-is",
  },
  upscaleFallback: {
    flag: "--upscale-fallback",
    description: "Keep the original image when upscaling fails",
  },
  upscaler: {
    flag: "--upscaler <upscaler>",
    description: "Upscaler to use: 'model' (local super-resolution model) or 'stability'",
  },
  noResize: {
    flag: "--no-resize",
    description: "Skip padding the image to a 6:4 aspect ratio",
  },
  outputDir: {
    flag: "-o, --output-dir <dir>",
    description: "Directory the wallpaper file is written to",
  },
};

/**
 * Commander argument parser for positive integers (e.g., '--count 4')
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}
