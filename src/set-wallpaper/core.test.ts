import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import path from "path";
import sharp from "sharp";
import { WallpaperSetError } from "../common/errors";
import {
  applyWallpaper,
  listWallpapers,
  loadImageFile,
  nextWallpaperIndex,
  pruneWallpapers,
} from "./core";
import { WallpaperSetter } from "./types";

function recordingSetter(): WallpaperSetter & { paths: string[] } {
  const paths: string[] = [];
  return {
    name: "recording",
    paths,
    async setBackground(imagePath: string) {
      // The file must already exist when the OS is pointed at it
      expect(fs.existsSync(imagePath)).toBe(true);
      paths.push(imagePath);
    },
  };
}

describe("set-wallpaper", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "wallpapers-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("listWallpapers", () => {
    it("lists wallpaper_<n> files by index and ignores everything else", () => {
      for (const name of ["wallpaper_10.jpg", "wallpaper_2.png", "notes.txt", "wallpaper_x.jpg"]) {
        fs.writeFileSync(path.join(dir, name), name);
      }
      fs.mkdirSync(path.join(dir, "wallpaper_99.jpg"));

      expect(listWallpapers(dir)).toEqual([
        { path: path.join(dir, "wallpaper_2.png"), index: 2 },
        { path: path.join(dir, "wallpaper_10.jpg"), index: 10 },
      ]);
      expect(nextWallpaperIndex(dir)).toBe(11);
    });

    it("starts at 1 for an empty or missing directory", () => {
      expect(nextWallpaperIndex(dir)).toBe(1);
      expect(nextWallpaperIndex(path.join(dir, "missing"))).toBe(1);
    });
  });

  it("pruneWallpapers removes only older wallpaper files", () => {
    for (const name of ["wallpaper_1.jpg", "wallpaper_2.jpg", "wallpaper_3.jpg", "keep.me"]) {
      fs.writeFileSync(path.join(dir, name), name);
    }

    const removed = pruneWallpapers(dir, 3);

    expect(removed).toEqual([path.join(dir, "wallpaper_1.jpg"), path.join(dir, "wallpaper_2.jpg")]);
    expect(fs.readdirSync(dir).sort()).toEqual(["keep.me", "wallpaper_3.jpg"]);
  });

  describe("applyWallpaper", () => {
    it("writes the bytes unchanged and points the setter at them", async () => {
      const setter = recordingSetter();
      const data = Buffer.from([0xff, 0xd8, 0xff, 0x00, 0x42]);

      const file = await applyWallpaper({ data, contentType: "image/jpeg" }, { dir, setter });

      expect(file).toEqual({ path: path.join(dir, "wallpaper_1.jpg"), index: 1 });
      expect(setter.paths).toEqual([file.path]);
      expect(fs.readFileSync(file.path)).toEqual(data);
    });

    it("rotates to a new file and removes the previous wallpaper afterwards", async () => {
      fs.writeFileSync(path.join(dir, "wallpaper_4.jpg"), "old");
      fs.writeFileSync(path.join(dir, "readme.txt"), "mine");
      const setter = recordingSetter();

      const file = await applyWallpaper({ data: Buffer.from("new"), contentType: "image/png" }, { dir, setter });

      expect(file.path).toBe(path.join(dir, "wallpaper_5.png"));
      expect(fs.readdirSync(dir).sort()).toEqual(["readme.txt", "wallpaper_5.png"]);
    });

    it("creates the directory when needed", async () => {
      const nested = path.join(dir, "Pictures", "wallpaper-generator");
      const file = await applyWallpaper(
        { data: Buffer.from("new"), contentType: "image/webp" },
        { dir: nested, setter: recordingSetter() }
      );
      expect(file.path).toBe(path.join(nested, "wallpaper_1.webp"));
    });

    it("keeps the previous wallpaper when the setter fails", async () => {
      fs.writeFileSync(path.join(dir, "wallpaper_1.jpg"), "old");
      const setter: WallpaperSetter = {
        name: "failing",
        async setBackground() {
          throw new WallpaperSetError("gsettings failed: no schema");
        },
      };

      await expect(
        applyWallpaper({ data: Buffer.from("new"), contentType: "image/jpeg" }, { dir, setter })
      ).rejects.toThrow("gsettings failed: no schema");
      expect(fs.readdirSync(dir)).toEqual(["wallpaper_1.jpg"]);
      expect(fs.readFileSync(path.join(dir, "wallpaper_1.jpg"), "utf-8")).toBe("old");
    });

    it("wraps unexpected setter errors", async () => {
      const setter: WallpaperSetter = {
        name: "broken",
        async setBackground() {
          throw new Error("access denied");
        },
      };

      const error = await applyWallpaper({ data: Buffer.from("new"), contentType: "image/jpeg" }, { dir, setter })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WallpaperSetError);
      expect(error).toMatchObject({ message: "Failed to set wallpaper: access denied" });
    });

    it("reports a directory it cannot create", async () => {
      const blocker = path.join(dir, "file");
      fs.writeFileSync(blocker, "not a directory");

      await expect(
        applyWallpaper(
          { data: Buffer.from("new"), contentType: "image/jpeg" },
          { dir: path.join(blocker, "walls"), setter: recordingSetter() }
        )
      ).rejects.toThrow(WallpaperSetError);
    });
  });

  describe("loadImageFile", () => {
    it("reads an image and detects its type", async () => {
      const imagePath = path.join(dir, "picture");
      const data = await sharp({ create: { width: 4, height: 4, channels: 3, background: "#336699" } })
        .png()
        .toBuffer();
      fs.writeFileSync(imagePath, data);

      const image = await loadImageFile(imagePath);

      expect(image.contentType).toBe("image/png");
      expect(image.data).toEqual(data);
    });

    it("rejects files that are not images", async () => {
      const textPath = path.join(dir, "notes.txt");
      fs.writeFileSync(textPath, "hello");

      await expect(loadImageFile(textPath)).rejects.toThrow(`Not a supported image: ${textPath}`);
    });

    it("rejects missing files", async () => {
      await expect(loadImageFile(path.join(dir, "nope.png"))).rejects.toThrow(WallpaperSetError);
    });
  });
});
