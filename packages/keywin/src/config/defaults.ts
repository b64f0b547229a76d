import { homedir } from "node:os";
import { join } from "node:path";

export const DEFAULT_BUS_NAME = "net.keywin.WindowListener";
export const DEFAULT_OBJECT_PATH = "/net/keywin/WindowListener";
export const DEFAULT_BRIGHTNESS = 30;
export const DEFAULT_ACTIVATION_REAP_DELAY_MS = 5_000;
export const DEFAULT_ICON_THEME = "hicolor";

function dataHome(env: NodeJS.ProcessEnv): string {
    return env.XDG_DATA_HOME || join(homedir(), ".local", "share");
}

export function defaultApplicationDirs(env: NodeJS.ProcessEnv = process.env): string[] {
    return [join(dataHome(env), "applications"), "/usr/local/share/applications", "/usr/share/applications"];
}

export function defaultIconDirs(env: NodeJS.ProcessEnv = process.env): string[] {
    return [join(dataHome(env), "icons"), "/usr/local/share/icons", "/usr/share/icons", "/usr/share/pixmaps"];
}
