import { z } from 'zod';

/**
 * Raw image bytes as returned by a service, plus their MIME type
 */
export interface GeneratedImage {
  data: Buffer;
  contentType: string;
}

export interface CraiyonOptions {
  apiUrl?: string;
  imageUrl?: string;
  modelVersion?: string;
}

export interface FetchOptions {
  count?: number;  // Upper bound on how many of the returned images to download
}

export interface FetchImageOptions extends FetchOptions {
  pick?: (images: GeneratedImage[]) => GeneratedImage;
}

export const DrawResponseSchema = z.object({
  images: z.array(z.string().min(1)).min(1),
});

/**
 * A service that turns a prompt into one or more images
 */
export interface ImageFetcher {
  fetchImages(prompt: string, options?: FetchOptions): Promise<GeneratedImage[]>;
}
