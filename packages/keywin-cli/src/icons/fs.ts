import { readdir, readFile, stat } from "node:fs/promises";

function isMissing(err: unknown): boolean {
    return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** File contents, or null when the path does not exist. Other failures propagate. */
export async function readIfExists(path: string): Promise<string | null> {
    try {
        return await readFile(path, "utf8");
    } catch (err) {
        if (isMissing(err)) return null;
        throw err;
    }
}

export async function isFile(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isFile();
    } catch (err) {
        if (isMissing(err)) return false;
        throw err;
    }
}

/** Directory entry names, or an empty list when the directory does not exist. */
export async function listDir(path: string): Promise<string[]> {
    try {
        return await readdir(path);
    } catch (err) {
        if (isMissing(err)) return [];
        throw err;
    }
}
