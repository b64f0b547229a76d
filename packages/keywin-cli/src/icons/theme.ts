import { isAbsolute, join } from "node:path";
import { isFile, listDir } from "./fs";

export type IconLookup = {
    /** Base directories holding themes and loose icons, highest priority first. */
    iconDirs: readonly string[];
    theme: string;
    /** Wanted edge length in pixels. */
    size: number;
};

const FALLBACK_THEME = "hicolor";
const SIZE_DIR = /^(\d+)x(\d+)$/;
const LOOSE_EXTENSIONS = [".png", ".svg"];

/** Pick the smallest size at least `wanted`, else the largest one. */
export function pickSize(sizes: readonly number[], wanted: number): number | null {
    const sorted = [...sizes].sort((a, b) => a - b);
    return sorted.find((size) => size >= wanted) ?? sorted.at(-1) ?? null;
}

async function findInTheme(themeDir: string, icon: string, wanted: number): Promise<string | null> {
    const scalable = join(themeDir, "scalable", "apps", `${icon}.svg`);
    if (await isFile(scalable)) return scalable;

    const available = new Map<number, string>();
    for (const entry of await listDir(themeDir)) {
        const match = SIZE_DIR.exec(entry);
        if (!match || match[1] !== match[2]) continue;
        const file = join(themeDir, entry, "apps", `${icon}.png`);
        if (await isFile(file)) available.set(Number(match[1]), file);
    }
    const size = pickSize([...available.keys()], wanted);
    return size === null ? null : (available.get(size) ?? null);
}

/**
 * Resolve an icon name to an image file: an absolute path is taken as is, then
 * each base dir is searched for the theme (falling back to hicolor), then for a
 * loose `<name>.png` / `<name>.svg` as found in pixmaps.
 */
export async function findIconFile(icon: string, lookup: IconLookup): Promise<string | null> {
    if (isAbsolute(icon)) {
        return (await isFile(icon)) ? icon : null;
    }
    if (icon === "" || icon.includes("/")) return null;

    const themes = [...new Set([lookup.theme, FALLBACK_THEME])];
    for (const theme of themes) {
        for (const base of lookup.iconDirs) {
            const found = await findInTheme(join(base, theme), icon, lookup.size);
            if (found) return found;
        }
    }

    for (const base of lookup.iconDirs) {
        for (const ext of LOOSE_EXTENSIONS) {
            const file = join(base, `${icon}${ext}`);
            if (await isFile(file)) return file;
        }
    }
    return null;
}
