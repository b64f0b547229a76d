import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findIconFile, pickSize } from "./theme";

describe("pickSize", () => {
    it("picks the smallest size that is large enough", () => {
        expect(pickSize([16, 128, 64, 48], 60)).toBe(64);
        expect(pickSize([72], 72)).toBe(72);
    });

    it("falls back to the largest size", () => {
        expect(pickSize([16, 32], 72)).toBe(32);
    });

    it("returns null without sizes", () => {
        expect(pickSize([], 72)).toBeNull();
    });
});

describe("findIconFile", () => {
    let root: string;
    let icons: string;
    let pixmaps: string;

    async function touch(...parts: string[]): Promise<string> {
        const file = join(...parts);
        await mkdir(dirname(file), { recursive: true });
        await writeFile(file, "");
        return file;
    }

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), "keywin-theme-spec-"));
        icons = join(root, "icons");
        pixmaps = join(root, "pixmaps");
        await mkdir(icons);
        await mkdir(pixmaps);
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    const lookup = () => ({ iconDirs: [icons, pixmaps], theme: "breeze", size: 72 });

    it("prefers the scalable icon", async () => {
        const svg = await touch(icons, "breeze", "scalable", "apps", "kate.svg");
        await touch(icons, "breeze", "96x96", "apps", "kate.png");
        await expect(findIconFile("kate", lookup())).resolves.toBe(svg);
    });

    it("picks the closest fixed size at least as large as the key", async () => {
        await touch(icons, "breeze", "48x48", "apps", "kate.png");
        const png = await touch(icons, "breeze", "96x96", "apps", "kate.png");
        await touch(icons, "breeze", "256x256", "apps", "kate.png");
        await touch(icons, "breeze", "128x128", "apps", "other.png");
        await expect(findIconFile("kate", lookup())).resolves.toBe(png);
    });

    it("ignores non-square and scaled size directories", async () => {
        await touch(icons, "breeze", "64x32", "apps", "kate.png");
        const png = await touch(icons, "breeze", "32x32", "apps", "kate.png");
        await touch(icons, "breeze", "32x32@2", "apps", "kate.png");
        await expect(findIconFile("kate", lookup())).resolves.toBe(png);
    });

    it("falls back to hicolor", async () => {
        const png = await touch(icons, "hicolor", "128x128", "apps", "kate.png");
        await expect(findIconFile("kate", lookup())).resolves.toBe(png);
    });

    it("falls back to loose pixmaps", async () => {
        const png = await touch(pixmaps, "kate.png");
        await expect(findIconFile("kate", lookup())).resolves.toBe(png);
    });

    it("takes an absolute path as is", async () => {
        const file = await touch(root, "custom", "logo.svg");
        await expect(findIconFile(file, lookup())).resolves.toBe(file);
        await expect(findIconFile(join(root, "missing.svg"), lookup())).resolves.toBeNull();
    });

    it("returns null when nothing matches", async () => {
        await expect(findIconFile("kate", lookup())).resolves.toBeNull();
        await expect(findIconFile("apps/kate", lookup())).resolves.toBeNull();
    });
});
