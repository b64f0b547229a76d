import type { IconResolver, KeyImage, LoggerContext } from "keywin";
import { findDesktopIcon } from "./desktop-entry";
import { renderKeyImage } from "./render";
import { findIconFile } from "./theme";

export type IconRenderer = (file: string, width: number, height: number) => Promise<KeyImage>;

export type ThemeIconResolverOptions = {
    applicationDirs: readonly string[];
    iconDirs: readonly string[];
    theme: string;
    width: number;
    height: number;
    logger: LoggerContext;
    render?: IconRenderer;
};

/**
 * Desktop entry → icon theme → key bitmap, cached per resource class.
 * A failed lookup is not cached, so the next window of that class retries.
 */
export class ThemeIconResolver implements IconResolver {
    private readonly cache = new Map<string, Promise<KeyImage | null>>();
    private readonly render: IconRenderer;

    constructor(private readonly options: ThemeIconResolverOptions) {
        this.render = options.render ?? renderKeyImage;
    }

    resolve(resourceClass: string): Promise<KeyImage | null> {
        const cached = this.cache.get(resourceClass);
        if (cached) return cached;

        const pending = this.lookup(resourceClass);
        this.cache.set(resourceClass, pending);
        pending.catch(() => {
            this.cache.delete(resourceClass);
        });
        return pending;
    }

    private async lookup(resourceClass: string): Promise<KeyImage | null> {
        const { logger } = this.options;
        const icon = await findDesktopIcon(resourceClass, this.options.applicationDirs);
        if (icon === null) {
            logger.debug("icons", "no desktop entry with an icon", { resourceClass });
            return null;
        }

        const file = await findIconFile(icon, {
            iconDirs: this.options.iconDirs,
            theme: this.options.theme,
            size: Math.max(this.options.width, this.options.height),
        });
        if (file === null) {
            logger.debug("icons", "icon not found in any theme", { resourceClass, icon });
            return null;
        }

        logger.debug("icons", "rendering icon", { resourceClass, file });
        return this.render(file, this.options.width, this.options.height);
    }
}
