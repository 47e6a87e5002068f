import type { RunContext } from '../application/RunContext.js';

/** One step of a run. */
export interface Stage<I, O> {
  readonly name: string;
  run(input: I, ctx: RunContext): Promise<O>;
}

/** Stage that feeds the output of `first` into `second`. */
export function composeStages<A, B, C>(first: Stage<A, B>, second: Stage<B, C>): Stage<A, C> {
  return {
    name: `${first.name} > ${second.name}`,
    async run(input: A, ctx: RunContext): Promise<C> {
      return second.run(await first.run(input, ctx), ctx);
    },
  };
}
