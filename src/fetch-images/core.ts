import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { errorMessage, FetchError, PromptError } from '../common/errors';
import {
  CraiyonOptions,
  DrawResponseSchema,
  FetchImageOptions,
  FetchOptions,
  GeneratedImage,
  ImageFetcher,
} from './types';

const DEFAULT_API_URL = 'https://api.craiyon.com/draw';
const DEFAULT_IMAGE_URL = 'https://img.craiyon.com';
const DEFAULT_MODEL_VERSION = '35s5hfwn9n78gb06';
const DEFAULT_CONTENT_TYPE = 'image/webp';

// The draw endpoint only answers requests that look like they come from the web app
const BROWSER_HEADERS = {
  pragma: 'no-cache',
  'cache-control': 'no-cache',
  origin: 'https://www.craiyon.com',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/110.0.0.0 Safari/537.36',
};

/**
 * Reject empty or whitespace-only prompts before any request goes out
 */
export function validatePrompt(prompt: string): string {
  const trimmed = prompt.trim();
  if (!trimmed) {
    throw new PromptError('Prompt must not be empty');
  }
  return trimmed;
}

function bodyText(data: unknown): string {
  if (Buffer.isBuffer(data)) return data.toString();
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString();
  if (typeof data === 'string') return data;
  return JSON.stringify(data) ?? '';
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name];
  return typeof value === 'string' && value ? value.split(';')[0].trim() : undefined;
}

export function randomPick<T>(items: T[], random: () => number = Math.random): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[Math.floor(random() * items.length)];
}

/**
 * Client for the Craiyon image generation service
 */
export class CraiyonClient implements ImageFetcher {
  private apiUrl: string;
  private imageUrl: string;
  private modelVersion: string;
  private http: AxiosInstance;

  constructor(options: CraiyonOptions = {}, http: AxiosInstance = axios.create()) {
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.imageUrl = (options.imageUrl ?? DEFAULT_IMAGE_URL).replace(/\/+$/, '');
    this.modelVersion = options.modelVersion ?? DEFAULT_MODEL_VERSION;
    this.http = http;
  }

  /**
   * Send one draw request and download every image it returns
   */
  async fetchImages(prompt: string, options?: FetchOptions): Promise<GeneratedImage[]> {
    const text = validatePrompt(prompt);
    const count = options?.count;
    if (count !== undefined && (!Number.isInteger(count) || count < 1)) {
      throw new FetchError(`Invalid count: ${count}. Must be a positive integer.`);
    }
    const paths = await this.requestDraw(text);
    const selected = count !== undefined ? paths.slice(0, count) : paths;

    const images: GeneratedImage[] = [];
    for (const imagePath of selected) {
      images.push(await this.downloadImage(imagePath));
    }
    return images;
  }

  /**
   * Fetch images for a prompt and keep one of them (random by default)
   */
  async fetchImage(prompt: string, options?: FetchImageOptions): Promise<GeneratedImage> {
    const images = await this.fetchImages(prompt, options);
    const pick = options?.pick ?? ((all: GeneratedImage[]) => randomPick(all));
    return pick(images);
  }

  private async requestDraw(prompt: string): Promise<string[]> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        this.apiUrl,
        { prompt, token: null, version: this.modelVersion },
        {
          validateStatus: () => true,
          headers: {
            ...BROWSER_HEADERS,
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
        }
      );
    } catch (error) {
      throw new FetchError(
        `Request to ${this.apiUrl} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (response.status !== 200) {
      throw new FetchError(`HTTP ${response.status}: ${bodyText(response.data)}`, {
        status: response.status,
      });
    }

    const parsed = DrawResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new FetchError(`Unexpected response from ${this.apiUrl}: ${bodyText(response.data)}`, {
        cause: parsed.error,
        status: response.status,
      });
    }
    return parsed.data.images;
  }

  private async downloadImage(imagePath: string): Promise<GeneratedImage> {
    const url = `${this.imageUrl}/${imagePath.replace(/^\/+/, '')}`;

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        validateStatus: () => true,
        headers: { ...BROWSER_HEADERS, Accept: '*/*' },
      });
    } catch (error) {
      throw new FetchError(
        `Download of ${url} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (response.status !== 200) {
      throw new FetchError(`HTTP ${response.status}: ${bodyText(response.data)}`, {
        status: response.status,
      });
    }

    return {
      data: Buffer.from(response.data),
      contentType: headerValue(response, 'content-type') ?? DEFAULT_CONTENT_TYPE,
    };
  }
}
