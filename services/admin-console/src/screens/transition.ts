/**
 * Outcome of a screen reducer: the next state and the side effects its controller has to run,
 * in order.
 */
export interface Transition<TState, TEffect> {
  state: TState;
  effects: TEffect[];
}
