#!/usr/bin/env node
import { Command } from "commander";
import { config } from "dotenv";
import path from "path";
import { loadConfig } from "../common/config";
import { errorMessage } from "../common/errors";
import { FLAGS, parsePositiveInt } from "../common/flags";
import { CliTimer } from "../common/timer";
import { CraiyonClient } from "../fetch-images/core";
import { createWallpaperSetter } from "../set-wallpaper/setters";
import { createUpscaler } from "../upscale-image/core";
import { generateWallpaper } from "./core";
import { resolvePrompt } from "./prompts";
import { GenerateResult } from "./types";

export interface GenerateCliOptions {
  count?: number;
  scale: number;
  upscale: boolean;
  upscaleFallback?: boolean;
  upscaler?: string;
  resize: boolean;
  outputDir?: string;
}

/**
 * Wire config, fetcher, upscaler and setter together and run the pipeline
 */
export async function runGenerate(
  words: string[],
  options: GenerateCliOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<GenerateResult> {
  const appConfig = loadConfig(options.upscaler ? { ...env, UPSCALER: options.upscaler } : env);

  // Resolve the setter first so an unsupported OS fails before any request goes out
  const setter = createWallpaperSetter(process.platform, env);
  const fetcher = new CraiyonClient(appConfig.craiyon);
  const upscaler = options.upscale ? createUpscaler(appConfig) : undefined;

  return generateWallpaper(
    resolvePrompt(words),
    {
      dir: path.resolve(options.outputDir ?? appConfig.wallpaperDir),
      count: options.count,
      upscale: options.upscale ? { scale: options.scale } : undefined,
      upscaleFallback: options.upscaleFallback,
      resize: options.resize,
    },
    { fetcher, setter, upscaler }
  );
}

export function createProgram(
  generate: (words: string[], options: GenerateCliOptions) => Promise<unknown> = runGenerate
): Command {
  // Single root command: a prompt word such as "generate" or "help" stays part of the prompt
  return new Command()
    .name("wallpaper-generator")
    .description("Generate an image from a prompt with Craiyon and set it as the desktop wallpaper")
    .argument("[prompt...]", "Text prompt; a random built-in prompt is used when omitted")
    .option(FLAGS.count.flag, FLAGS.count.description, parsePositiveInt)
    .option(FLAGS.scale.flag, FLAGS.scale.description, parsePositiveInt, 4)
    .option(FLAGS.noUpscale.flag, FLAGS.noUpscale.description)
    .option(FLAGS.upscaleFallback.flag, FLAGS.upscaleFallback.description)
    .option(FLAGS.upscaler.flag, FLAGS.upscaler.description)
    .option(FLAGS.noResize.flag, FLAGS.noResize.description)
    .option(FLAGS.outputDir.flag, FLAGS.outputDir.description)
    .action(async (words: string[], options: GenerateCliOptions) => {
      await generate(words, options);
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
