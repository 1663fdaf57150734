import * as fs from 'fs';
import * as os from 'os';
import path from 'path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export function ensureDirectory(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Default wallpaper directory: ~/Pictures/wallpaper-generator
 */
export function getDefaultWallpaperDir(home: string = os.homedir()): string {
  return path.join(path.normalize(home), 'Pictures', 'wallpaper-generator');
}
