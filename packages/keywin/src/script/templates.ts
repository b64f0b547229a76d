// KWin scripts. `{{NAME}}` placeholders are replaced with escaped string literals
// by renderTemplate(); never concatenate values into these.

const LOG_FUNCTION = `function log(message) {
    console.log({{TAG}}, message);
    callDBus({{SERVICE}}, {{PATH}}, {{INTERFACE}}, "Log", String(message));
}

function describe(window) {
    return "caption='" + window.caption + "', resourceClass=" + window.resourceClass;
}
`;

/** Long-lived: reports every existing window, then forwards add/remove notifications. */
export const OBSERVER_TEMPLATE = `${LOG_FUNCTION}
function add(window) {
    try {
        log("ADD [enter] " + describe(window));
        callDBus({{SERVICE}}, {{PATH}}, {{INTERFACE}}, "WindowAdded",
            window.internalId.toString(), String(window.caption), String(window.resourceClass));
        log("ADD [exit] " + describe(window));
    } catch (e) {
        log("ADD [error] " + describe(window) + ", error=" + e);
    }
}

function remove(window) {
    try {
        log("REMOVE [enter] " + describe(window));
        callDBus({{SERVICE}}, {{PATH}}, {{INTERFACE}}, "WindowRemoved", window.internalId.toString());
        log("REMOVE [exit] " + describe(window));
    } catch (e) {
        log("REMOVE [error] " + describe(window) + ", error=" + e);
    }
}

log("INIT");

for (const window of workspace.windowList()) {
    add(window);
}

workspace.windowAdded.connect(add);
workspace.windowRemoved.connect(remove);
`;

/** One-shot: makes the window whose internal id equals {{TARGET}} active. */
export const ACTIVATION_TEMPLATE = `${LOG_FUNCTION}
const target = {{TARGET}};

for (const window of workspace.windowList()) {
    const id = window.internalId.toString();
    log(id + " == " + target);
    if (id === target) {
        workspace.activeWindow = window;
    }
}
`;
