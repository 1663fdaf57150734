import axios, { AxiosInstance, AxiosResponse } from 'axios';
import FormData from 'form-data';
import { errorMessage, UpscaleError } from '../common/errors';
import { extensionFor } from '../common/images';
import { GeneratedImage } from '../fetch-images/types';
import { StabilityConfig, StabilityOptions, Upscaler } from './types';
import { validateScale } from './utils';

/**
 * Stability AI conservative upscale. The service picks the output resolution
 * (about 4 megapixels) itself, so `scale` is only validated.
 */
export class StabilityUpscaler implements Upscaler {
  readonly name = 'stability';
  private apiKey: string;
  private baseUrl = 'https://api.stability.ai/v2beta/stable-image/upscale/conservative';

  constructor(
    config: StabilityConfig,
    private options: StabilityOptions = { creativity: 0.2, output_format: 'png' },
    private http: AxiosInstance = axios.create()
  ) {
    this.apiKey = config.apiKey;
  }

  async upscale(image: GeneratedImage, scale: number): Promise<GeneratedImage> {
    validateScale(scale);
    const options = this.options;

    if (options.creativity !== undefined && (options.creativity < 0.2 || options.creativity > 0.5)) {
      throw new UpscaleError('Creativity must be between 0.2 and 0.5');
    }

    if (options.seed !== undefined && (options.seed < 0 || options.seed > 4294967294)) {
      throw new UpscaleError('Seed must be between 0 and 4294967294');
    }

    const formData = new FormData();
    formData.append('image', image.data, {
      filename: `image.${extensionFor(image.contentType)}`,
      contentType: image.contentType,
    });
    formData.append('prompt', options.prompt || 'an image');  // Simple default prompt

    // Optional fields
    if (options.negative_prompt) {
      formData.append('negative_prompt', options.negative_prompt);
    }
    if (options.seed !== undefined) {
      formData.append('seed', options.seed.toString());
    }
    if (options.output_format) {
      formData.append('output_format', options.output_format);
    }
    if (options.creativity !== undefined) {
      formData.append('creativity', options.creativity.toString());
    }

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.post<ArrayBuffer>(this.baseUrl, formData, {
        validateStatus: () => true,
        responseType: 'arraybuffer',
        headers: {
          ...formData.getHeaders(),
          Authorization: `Bearer ${this.apiKey}`,
          Accept: 'image/*',
        },
      });
    } catch (error) {
      throw new UpscaleError(
        `Request to Stability AI failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (response.status !== 200) {
      const body = Buffer.from(response.data).toString();
      if (body.includes('Country, region or territory not supported')) {
        throw new UpscaleError('Region not supported - VPN required');
      }
      throw new UpscaleError(`HTTP ${response.status}: ${body}`);
    }

    return {
      data: Buffer.from(response.data),
      contentType: `image/${options.output_format ?? 'png'}`,
    };
  }
}
