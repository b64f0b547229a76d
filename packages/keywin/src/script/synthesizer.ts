import type { WindowIdentity } from "../windows/types";
import { toScriptLiteral } from "./escape";
import { ACTIVATION_TEMPLATE, OBSERVER_TEMPLATE } from "./templates";
import type { CallbackAddress, TemplateParams } from "./types";

const PLACEHOLDER = /\{\{([A-Z_]+)\}\}/g;
const LOG_TAG = "keywin";

/** Substitute every `{{NAME}}` in `template` with `params[NAME]` as a string literal. */
export function renderTemplate(template: string, params: TemplateParams): string {
    return template.replace(PLACEHOLDER, (_match, name: string) => {
        const value = Object.hasOwn(params, name) ? params[name] : undefined;
        if (value === undefined) {
            throw new Error(`[keywin] renderTemplate: missing parameter "${name}"`);
        }
        return toScriptLiteral(value);
    });
}

/**
 * Builds the scripts injected into KWin. Both kinds call back to the same
 * D-Bus address, which is fixed for the lifetime of the synthesizer.
 */
export class ScriptSynthesizer {
    private readonly baseParams: TemplateParams;

    constructor(address: CallbackAddress) {
        this.baseParams = {
            TAG: LOG_TAG,
            SERVICE: address.busName,
            PATH: address.objectPath,
            INTERFACE: address.interfaceName,
        };
    }

    observer(): string {
        return renderTemplate(OBSERVER_TEMPLATE, this.baseParams);
    }

    activation(target: WindowIdentity): string {
        return renderTemplate(ACTIVATION_TEMPLATE, { ...this.baseParams, TARGET: target });
    }
}
