/**
 * A composable, stateless processing step. `invoke` applies it to one input;
 * `pipe` chains another step after it.
 */
export interface PipelineStage<I, O> {
  readonly name: string;
  invoke(input: I): O;
  batch(inputs: readonly I[]): O[];
  pipe<N>(next: PipelineStage<O, N> | ((input: O) => N)): PipelineStage<I, N>;
}

export function stage<I, O>(fn: (input: I) => O, name: string = fn.name || "anonymous"): PipelineStage<I, O> {
  const self: PipelineStage<I, O> = {
    name,
    invoke: fn,
    batch: inputs => inputs.map(i => fn(i)),
    pipe<N>(next: PipelineStage<O, N> | ((input: O) => N)): PipelineStage<I, N> {
      const n = typeof next === "function" ? stage(next) : next;
      return stage((input: I) => n.invoke(fn(input)), `${name} | ${n.name}`);
    },
  };
  return self;
}

