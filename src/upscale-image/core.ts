import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { promisify } from 'util';
import { AppConfig } from '../common/config';
import { errorMessage, UpscaleError } from '../common/errors';
import { extensionFor } from '../common/images';
import { GeneratedImage } from '../fetch-images/types';
import { StabilityUpscaler } from './stability';
import { ModelUpscalerConfig, Upscaler } from './types';
import { validateScale } from './utils';

const execFileAsync = promisify(execFile);

export const MODEL_SCALES = [2, 3, 4];

/**
 * Upscales with a pretrained super-resolution model run by realesrgan-ncnn-vulkan
 */
export class ModelUpscaler implements Upscaler {
  readonly name = 'model';

  constructor(private config: ModelUpscalerConfig) {}

  modelFiles(): string[] {
    return ['param', 'bin'].map((ext) =>
      path.join(this.config.modelDir, `${this.config.modelName}.${ext}`)
    );
  }

  async upscale(image: GeneratedImage, scale: number): Promise<GeneratedImage> {
    validateScale(scale);
    if (!MODEL_SCALES.includes(scale)) {
      throw new UpscaleError(
        `Model ${this.config.modelName} does not support scale ${scale} (supported: ${MODEL_SCALES.join(', ')})`
      );
    }

    const missing = this.modelFiles().filter((file) => !fs.existsSync(file));
    if (missing.length > 0) {
      throw new UpscaleError(`Model file not found: ${missing.join(', ')}`);
    }

    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'wallpaper-upscale-'));
    try {
      const inputPath = path.join(workDir, `input.${extensionFor(image.contentType)}`);
      const outputPath = path.join(workDir, 'output.png');
      await fs.promises.writeFile(inputPath, image.data);

      try {
        await execFileAsync(this.config.binary, [
          '-i', inputPath,
          '-o', outputPath,
          '-s', String(scale),
          '-n', this.config.modelName,
          '-m', this.config.modelDir,
        ]);
      } catch (error) {
        throw new UpscaleError(`${this.config.binary} failed: ${errorMessage(error)}`, { cause: error });
      }

      if (!fs.existsSync(outputPath)) {
        throw new UpscaleError(`${this.config.binary} produced no output image`);
      }

      return {
        data: await fs.promises.readFile(outputPath),
        contentType: 'image/png',
      };
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}

/**
 * Build the upscaler selected in the configuration
 */
export function createUpscaler(config: AppConfig): Upscaler {
  switch (config.upscaler) {
    case 'model':
      return new ModelUpscaler(config.model);
    case 'stability':
      if (!config.stabilityApiKey) {
        throw new UpscaleError('STABILITY_API_KEY environment variable is not set');
      }
      return new StabilityUpscaler({ apiKey: config.stabilityApiKey });
  }
}
