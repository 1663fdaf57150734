import { execFile } from 'child_process';
import { pathToFileURL } from 'url';
import { promisify } from 'util';
import { errorMessage, WallpaperSetError } from '../common/errors';
import { WallpaperSetter } from './types';

const execFileAsync = promisify(execFile);

// SystemParametersInfoW constants
const SPI_SETDESKWALLPAPER = 0x14;
const SPIF_UPDATEINIFILE = 0x1;
const SPIF_SENDWININICHANGE = 0x2;

async function run(command: string, args: string[]): Promise<void> {
  try {
    await execFileAsync(command, args);
  } catch (error) {
    throw new WallpaperSetError(`${command} failed: ${errorMessage(error)}`, { cause: error });
  }
}

function powershellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export class WindowsWallpaperSetter implements WallpaperSetter {
  readonly name = 'windows';

  script(imagePath: string): string {
    const flags = SPIF_UPDATEINIFILE | SPIF_SENDWININICHANGE;
    return [
      'Add-Type -TypeDefinition @"',
      'using System.Runtime.InteropServices;',
      'public static class Wallpaper {',
      '  [DllImport("user32.dll", CharSet = CharSet.Unicode, SetLastError = true)]',
      '  public static extern bool SystemParametersInfo(uint action, uint param, string value, uint flags);',
      '}',
      '"@',
      // Clearing first makes Windows drop its cached copy of the previous image
      `[void][Wallpaper]::SystemParametersInfo(${SPI_SETDESKWALLPAPER}, 0, '', ${flags})`,
      `if (-not [Wallpaper]::SystemParametersInfo(${SPI_SETDESKWALLPAPER}, 0, ${powershellString(imagePath)}, ${flags})) { throw 'SystemParametersInfo failed' }`,
    ].join('\n');
  }

  async setBackground(imagePath: string): Promise<void> {
    await run('powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', this.script(imagePath)]);
  }
}

export class MacWallpaperSetter implements WallpaperSetter {
  readonly name = 'macos';

  async setBackground(imagePath: string): Promise<void> {
    await run('osascript', [
      '-e',
      `tell application "System Events" to tell every desktop to set picture to ${appleScriptString(imagePath)}`,
    ]);
  }
}

export class GnomeWallpaperSetter implements WallpaperSetter {
  readonly name = 'gnome';

  constructor(
    private schema: string = 'org.gnome.desktop.background',
    private keys: string[] = ['picture-uri', 'picture-uri-dark']
  ) {}

  /**
   * The first key decides success. Once it points at the new file the OS
   * already references it, so a missing extra key (GNOME before 42 has no
   * picture-uri-dark) only warns.
   */
  async setBackground(imagePath: string): Promise<void> {
    const uri = pathToFileURL(imagePath).href;
    const [primary, ...extra] = this.keys;
    await run('gsettings', ['set', this.schema, primary, uri]);

    for (const key of extra) {
      try {
        await run('gsettings', ['set', this.schema, key, uri]);
      } catch (error) {
        console.warn(`Warning: could not set ${this.schema} ${key}: ${errorMessage(error)}`);
      }
    }
  }
}

export class KdeWallpaperSetter implements WallpaperSetter {
  readonly name = 'kde';

  async setBackground(imagePath: string): Promise<void> {
    await run('plasma-apply-wallpaperimage', [imagePath]);
  }
}

function linuxSetter(env: NodeJS.ProcessEnv): WallpaperSetter {
  const desktops = (env.XDG_CURRENT_DESKTOP ?? env.DESKTOP_SESSION ?? '')
    .toLowerCase()
    .split(':')
    .filter(Boolean);

  if (desktops.includes('kde')) {
    return new KdeWallpaperSetter();
  }
  if (desktops.includes('cinnamon') || desktops.includes('x-cinnamon')) {
    return new GnomeWallpaperSetter('org.cinnamon.desktop.background', ['picture-uri']);
  }
  if (desktops.includes('gnome')) {
    return new GnomeWallpaperSetter();
  }
  if (['unity', 'budgie', 'pantheon'].some((desktop) => desktops.includes(desktop))) {
    return new GnomeWallpaperSetter('org.gnome.desktop.background', ['picture-uri']);
  }

  throw new WallpaperSetError(
    `Unsupported desktop environment: ${desktops.length > 0 ? desktops.join(':') : 'unknown'}`
  );
}

/**
 * Pick the wallpaper setter for the running OS (and desktop, on Linux)
 */
export function createWallpaperSetter(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): WallpaperSetter {
  switch (platform) {
    case 'win32':
    case 'cygwin':
      return new WindowsWallpaperSetter();
    case 'darwin':
      return new MacWallpaperSetter();
    case 'linux':
      return linuxSetter(env);
    default:
      throw new WallpaperSetError(`Unsupported platform: ${platform}`);
  }
}
