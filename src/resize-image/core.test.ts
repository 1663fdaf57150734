import { describe, it, expect } from "vitest";
import sharp from "sharp";
import { ResizeError } from "../common/errors";
import { GeneratedImage } from "../fetch-images/types";
import { padToAspect } from "./core";

const BLUE = { r: 0, g: 0, b: 255 };
const RED = { r: 255, g: 0, b: 0 };

async function solid(width: number, height: number, background = BLUE): Promise<GeneratedImage> {
  const data = await sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();
  return { data, contentType: "image/png" };
}

async function pixel(image: GeneratedImage, x: number, y: number) {
  const { data, info } = await sharp(image.data).raw().toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return { r: data[offset], g: data[offset + 1], b: data[offset + 2] };
}

describe("padToAspect", () => {
  it("returns images already at 6:4 untouched", async () => {
    const image = await solid(300, 200);
    expect(await padToAspect(image)).toBe(image);
  });

  it("pads a square to 6:4 as JPEG", async () => {
    const result = await padToAspect(await solid(100, 100));
    const metadata = await sharp(result.data).metadata();

    expect(result.contentType).toBe("image/jpeg");
    expect(metadata.format).toBe("jpeg");
    expect(metadata.width).toBe(150);
    expect(metadata.height).toBe(100);
  });

  it("squashes non-square images to their height first", async () => {
    const result = await padToAspect(await solid(200, 100));
    const metadata = await sharp(result.data).metadata();

    expect(metadata.width).toBe(150);
    expect(metadata.height).toBe(100);
  });

  it("fills the sides with mirrored edge strips", async () => {
    // 80x80 blue square whose 10 leftmost columns are red
    const redEdge = await sharp({ create: { width: 10, height: 80, channels: 3, background: RED } })
      .png()
      .toBuffer();
    const data = await sharp({ create: { width: 80, height: 80, channels: 3, background: BLUE } })
      .composite([{ input: redEdge, left: 0, top: 0 }])
      .png()
      .toBuffer();

    const result = await padToAspect({ data, contentType: "image/png" });

    // Left strip is columns 0-19 mirrored: blue at x 0-9, red at x 10-19, then the square at x 20
    const outerLeft = await pixel(result, 3, 40);
    const innerLeft = await pixel(result, 15, 40);
    const square = await pixel(result, 24, 40);
    const right = await pixel(result, 115, 40);

    expect(outerLeft.b).toBeGreaterThan(outerLeft.r);
    expect(innerLeft.r).toBeGreaterThan(innerLeft.b);
    expect(square.r).toBeGreaterThan(square.b);
    expect(right.b).toBeGreaterThan(right.r);
  });

  it("raises ResizeError for data that is not an image", async () => {
    await expect(
      padToAspect({ data: Buffer.from("not an image"), contentType: "image/png" })
    ).rejects.toThrow(ResizeError);
  });

  it("only pads to 6:4", async () => {
    await expect(padToAspect(await solid(100, 100), 16 / 9)).rejects.toThrow(
      "Unsupported aspect ratio"
    );
  });
});
