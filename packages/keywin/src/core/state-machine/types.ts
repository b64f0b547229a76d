export type TransitionTable<TState extends string> = Record<TState, readonly TState[]>;

export type StateMachineConfig<TState extends string> = {
    transitions: TransitionTable<TState>;
    initial: TState;
    /** Used in error messages. */
    name?: string;
};

export type TransitionListener<TState extends string> = (from: TState, to: TState) => void;
