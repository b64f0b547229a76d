/** Where scripts running inside KWin send their callbacks. */
export type CallbackAddress = {
    busName: string;
    objectPath: string;
    interfaceName: string;
};

export type TemplateParams = Readonly<Record<string, string>>;
