import sharp from 'sharp';
import { errorMessage, ResizeError } from '../common/errors';
import { GeneratedImage } from '../fetch-images/types';

export const WALLPAPER_RATIO = 6 / 4;
const RATIO_TOLERANCE = 0.01;

interface StripParams {
  square: Buffer;
  left: number;
  width: number;
  height: number;
}

/**
 * Extract a vertical strip from the square image and mirror it horizontally
 */
async function mirroredStrip({ square, left, width, height }: StripParams): Promise<Buffer> {
  return sharp(square)
    .extract({ left, top: 0, width, height })
    .flop()
    .png()
    .toBuffer();
}

/**
 * Pad an image to a 6:4 wallpaper.
 *
 * Non-square images are first squashed to a height x height square. The square
 * is centred on a canvas one half wider, and each side is filled with the
 * mirrored outer quarter of the square so the edges blend in.
 * Images already at 6:4 are returned untouched.
 */
export async function padToAspect(
  image: GeneratedImage,
  ratio: number = WALLPAPER_RATIO
): Promise<GeneratedImage> {
  let width: number | undefined;
  let height: number | undefined;
  try {
    ({ width, height } = await sharp(image.data).metadata());
  } catch (error) {
    throw new ResizeError(`Failed to read image: ${errorMessage(error)}`, { cause: error });
  }
  if (!width || !height) {
    throw new ResizeError('Failed to get image dimensions');
  }

  if (Math.abs(width / height - ratio) < RATIO_TOLERANCE) {
    return image;
  }
  if (Math.abs(ratio - WALLPAPER_RATIO) >= RATIO_TOLERANCE) {
    throw new ResizeError(`Unsupported aspect ratio: ${ratio}. Only 6:4 padding is available.`);
  }

  try {
    const size = height;
    const square = await sharp(image.data)
      .resize(size, size, { fit: 'fill' })
      .png()
      .toBuffer();

    const quarter = Math.floor(size / 4);
    if (quarter === 0) {
      throw new ResizeError(`Image too small to pad: ${width}x${height}`);
    }

    const [leftStrip, rightStrip] = await Promise.all([
      mirroredStrip({ square, left: 0, width: quarter, height: size }),
      mirroredStrip({ square, left: size - quarter, width: quarter, height: size }),
    ]);

    const data = await sharp({
      create: {
        width: size + 2 * quarter,
        height: size,
        channels: 3,
        background: { r: 0, g: 0, b: 0 },
      },
    })
      .composite([
        { input: square, left: quarter, top: 0 },
        { input: leftStrip, left: 0, top: 0 },
        { input: rightStrip, left: size + quarter, top: 0 },
      ])
      .jpeg({ quality: 95 })
      .toBuffer();

    return { data, contentType: 'image/jpeg' };
  } catch (error) {
    if (error instanceof ResizeError) throw error;
    throw new ResizeError(`Failed to resize image: ${errorMessage(error)}`, { cause: error });
  }
}
