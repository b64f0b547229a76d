import dbus from "dbus-next";
import { createHostCallbacks, type EventSink, type HostCallbacks, toError } from "keywin";

const INVALID_ARGS = "org.freedesktop.DBus.Error.InvalidArgs";

/**
 * The object KWin scripts reach through `callDBus()`. Each method hands its
 * arguments to the host callbacks; a rejected call goes back to the script as
 * an InvalidArgs error.
 */
export class WindowListener extends dbus.interface.Interface {
    private readonly callbacks: HostCallbacks;

    constructor(interfaceName: string, sink: EventSink) {
        super(interfaceName);
        this.callbacks = createHostCallbacks(sink);
    }

    Log(message: string): void {
        forward(() => this.callbacks.Log(message));
    }

    WindowAdded(identity: string, caption: string, resourceClass: string): void {
        forward(() => this.callbacks.WindowAdded(identity, caption, resourceClass));
    }

    WindowRemoved(identity: string): void {
        forward(() => this.callbacks.WindowRemoved(identity));
    }
}

WindowListener.configureMembers({
    methods: {
        Log: { inSignature: "s", outSignature: "" },
        WindowAdded: { inSignature: "sss", outSignature: "" },
        WindowRemoved: { inSignature: "s", outSignature: "" },
    },
});

function forward(call: () => void): void {
    try {
        call();
    } catch (err) {
        throw new dbus.DBusError(INVALID_ARGS, toError(err).message);
    }
}
