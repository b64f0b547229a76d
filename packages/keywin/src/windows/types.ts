/** Opaque token naming one window instance for its whole lifetime. */
export type WindowIdentity = string;

export type WindowData = {
    readonly identity: WindowIdentity;
    readonly caption: string;
    /** Application class, used to find the window's icon. */
    readonly resourceClass: string;
};
