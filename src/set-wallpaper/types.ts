/**
 * Platform capability: make the image at `imagePath` the desktop background
 */
export interface WallpaperSetter {
  readonly name: string;
  setBackground(imagePath: string): Promise<void>;
}

export interface WallpaperFile {
  path: string;
  index: number;
}

export interface ApplyOptions {
  dir: string;
  setter: WallpaperSetter;
}
