import type { StateMachineConfig, TransitionListener, TransitionTable } from "./types";

/**
 * Table-driven finite state machine.
 *
 * Every legal edge is listed up front; anything else throws and leaves the
 * current state untouched. Listeners run synchronously after the state changed.
 */
export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly transitions: TransitionTable<TState>;
    private readonly name: string;
    private readonly listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this.transitions = config.transitions;
        this.name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    /** True when the current state is one of `states`. */
    is(...states: TState[]): boolean {
        return states.includes(this._current);
    }

    /** True when no edge leaves the current state. */
    get terminal(): boolean {
        return this.transitions[this._current].length === 0;
    }

    canTransition(target: TState): boolean {
        return this.transitions[this._current].includes(target);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`[keywin] ${this.name}: illegal transition "${this._current}" → "${target}"`);
        }
        const from = this._current;
        this._current = target;
        for (const listener of this.listeners) {
            listener(from, target);
        }
    }

    assertState(...allowed: TState[]): void {
        if (!this.is(...allowed)) {
            const list = allowed.map((s) => `"${s}"`).join(", ");
            throw new Error(`[keywin] ${this.name}: expected state ${list}, but current is "${this._current}"`);
        }
    }

    onTransition(listener: TransitionListener<TState>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }
}
