#!/usr/bin/env node
import { Command } from "commander";
import { config } from "dotenv";
import path from "path";
import { loadConfig } from "../common/config";
import { errorMessage } from "../common/errors";
import { FLAGS } from "../common/flags";
import { CliTimer } from "../common/timer";
import { applyWallpaper, loadImageFile } from "./core";
import { createWallpaperSetter } from "./setters";
import { WallpaperFile } from "./types";

export interface SetCliOptions {
  outputDir?: string;
}

/**
 * Copy an existing image into the wallpaper directory and set it as background
 */
export async function runSet(
  imagePath: string,
  options: SetCliOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<WallpaperFile> {
  const appConfig = loadConfig(env);
  const setter = createWallpaperSetter(process.platform, env);
  const image = await loadImageFile(path.resolve(imagePath));
  return applyWallpaper(image, {
    dir: path.resolve(options.outputDir ?? appConfig.wallpaperDir),
    setter,
  });
}

export function createProgram(
  set: (imagePath: string, options: SetCliOptions) => Promise<unknown> = runSet
): Command {
  return new Command()
    .name("set-wallpaper")
    .description("Set an existing image file as the desktop wallpaper")
    .argument("<image>", "Path to the image file")
    .option(FLAGS.outputDir.flag, FLAGS.outputDir.description)
    .action(async (imagePath: string, options: SetCliOptions) => {
      await set(imagePath, options);
    });
}

async function main() {
  config();
  const timer = new CliTimer();
  timer.start();

  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  } finally {
    timer.stop();
  }
}

if (require.main === module) {
  void main();
}
