import * as fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { errorMessage, WallpaperSetError } from '../common/errors';
import { extensionFor } from '../common/images';
import { ensureDirectory } from '../common/paths';
import { GeneratedImage } from '../fetch-images/types';
import { ApplyOptions, WallpaperFile } from './types';

const WALLPAPER_PATTERN = /^wallpaper_(\d+)\.[A-Za-z0-9]+$/;

/**
 * List the wallpaper_<n>.<ext> files in a directory, lowest index first.
 * Other files are ignored.
 */
export function listWallpapers(dir: string): WallpaperFile[] {
  if (!fs.existsSync(dir)) {
    return [];
  }

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((dirent) => dirent.isFile())
    .map((dirent) => {
      const match = dirent.name.match(WALLPAPER_PATTERN);
      return match ? { path: path.join(dir, dirent.name), index: parseInt(match[1], 10) } : null;
    })
    .filter((file): file is WallpaperFile => file !== null)
    .sort((a, b) => a.index - b.index);
}

/**
 * Index for the next wallpaper file: one past the highest existing index
 */
export function nextWallpaperIndex(dir: string): number {
  const files = listWallpapers(dir);
  return files.reduce((max, file) => Math.max(max, file.index), 0) + 1;
}

/**
 * Delete wallpaper files older than `keepIndex`. Returns the removed paths.
 */
export function pruneWallpapers(dir: string, keepIndex: number): string[] {
  const removed: string[] = [];
  for (const file of listWallpapers(dir)) {
    if (file.index >= keepIndex) continue;
    try {
      fs.unlinkSync(file.path);
      removed.push(file.path);
    } catch (error) {
      console.warn(`Warning: could not remove old wallpaper ${file.path}: ${errorMessage(error)}`);
    }
  }
  return removed;
}

/**
 * Write image bytes to a new wallpaper file in `dir`
 */
export async function saveWallpaper(image: GeneratedImage, dir: string): Promise<WallpaperFile> {
  try {
    ensureDirectory(dir);
    const index = nextWallpaperIndex(dir);
    const filePath = path.join(dir, `wallpaper_${index}.${extensionFor(image.contentType)}`);
    await fs.promises.writeFile(filePath, image.data);
    return { path: filePath, index };
  } catch (error) {
    throw new WallpaperSetError(`Failed to save wallpaper in ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Save the image and make it the desktop background. Older wallpaper files
 * are only removed once the OS has switched to the new one; if the switch
 * fails the new file is removed instead.
 */
export async function applyWallpaper(
  image: GeneratedImage,
  { dir, setter }: ApplyOptions
): Promise<WallpaperFile> {
  const file = await saveWallpaper(image, dir);
  console.log(`Saved wallpaper to: ${file.path}`);

  try {
    await setter.setBackground(file.path);
  } catch (error) {
    await fs.promises.rm(file.path, { force: true });
    if (error instanceof WallpaperSetError) throw error;
    throw new WallpaperSetError(`Failed to set wallpaper: ${errorMessage(error)}`, { cause: error });
  }

  pruneWallpapers(dir, file.index);
  return file;
}

/**
 * Read an image file from disk, checking it decodes as an image
 */
export async function loadImageFile(filePath: string): Promise<GeneratedImage> {
  let data: Buffer;
  try {
    data = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new WallpaperSetError(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  let format: string | undefined;
  try {
    ({ format } = await sharp(data).metadata());
  } catch (error) {
    throw new WallpaperSetError(`Not a supported image: ${filePath}`, { cause: error });
  }
  if (!format) {
    throw new WallpaperSetError(`Not a supported image: ${filePath}`);
  }

  return { data, contentType: `image/${format}` };
}
