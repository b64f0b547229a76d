import { join } from "node:path";
import { readIfExists } from "./fs";

export type DesktopEntryGroups = Map<string, Map<string, string>>;

const GROUP_HEADER = /^\[([^\]]+)\]$/;

/**
 * Parse a `.desktop` file into groups of keys. Comments and blank lines are
 * skipped, and later duplicates win. Localised keys such as `Name[de]` are
 * kept under their full name.
 */
export function parseDesktopEntry(text: string): DesktopEntryGroups {
    const groups: DesktopEntryGroups = new Map();
    let current: Map<string, string> | null = null;

    for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();
        if (line === "" || line.startsWith("#")) continue;

        const group = GROUP_HEADER.exec(line)?.[1];
        if (group !== undefined) {
            current = groups.get(group) ?? new Map<string, string>();
            groups.set(group, current);
            continue;
        }

        const eq = line.indexOf("=");
        if (eq <= 0 || current === null) continue;
        current.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
    }
    return groups;
}

/** The `Icon` key of the `[Desktop Entry]` group, if it has a value. */
export function readIconKey(text: string): string | null {
    const icon = parseDesktopEntry(text).get("Desktop Entry")?.get("Icon");
    return icon ? icon : null;
}

/**
 * Find the icon name an application declares, by its window resource class.
 * Directories are searched in order; in each, the exact class name is tried
 * before its lowercase form.
 */
export async function findDesktopIcon(resourceClass: string, applicationDirs: readonly string[]): Promise<string | null> {
    if (resourceClass === "" || resourceClass.includes("/")) return null;

    const names = [...new Set([resourceClass, resourceClass.toLowerCase()])];
    for (const dir of applicationDirs) {
        for (const name of names) {
            const text = await readIfExists(join(dir, `${name}.desktop`));
            if (text === null) continue;
            const icon = readIconKey(text);
            if (icon) return icon;
        }
    }
    return null;
}
