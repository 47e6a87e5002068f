import { RunStatus } from '@ledgerline/core';
import type { DestinationDefinition, RawRecord } from '@ledgerline/core';
import type { ScaleOverrides, TransformSpec, WindowedTransformer } from '@ledgerline/analytics';
import type { Stage } from '../../domain/Stage.js';
import type { RunContext } from '../RunContext.js';

/** Scale of every decimal column the destination declares one for. */
export function destinationScales(destination: DestinationDefinition): ScaleOverrides {
  const scales: Record<string, number> = {};
  for (const column of destination.columns) {
    if (column.type === 'decimal' && column.scale !== undefined) scales[column.name] = column.scale;
  }
  return scales;
}

/** The spec with `scales` layered over the destination's; the spec's own entries win. */
function withScales(spec: TransformSpec, scales: ScaleOverrides): TransformSpec {
  if (spec.kind === 'enrichment') return spec;
  return { ...spec, scales: { ...scales, ...spec.scales } };
}

/** Applies the transform chain to the validated rows, rounding to the destination's scales. */
export class TransformBatch implements Stage<RawRecord[], RawRecord[]> {
  readonly name = 'transform';
  private readonly specs: readonly TransformSpec[];

  constructor(
    private readonly transformer: WindowedTransformer,
    specs: readonly TransformSpec[],
    destination?: DestinationDefinition,
  ) {
    const scales = destination ? destinationScales(destination) : {};
    this.specs = specs.map((spec) => withScales(spec, scales));
  }

  async run(rows: RawRecord[], ctx: RunContext): Promise<RawRecord[]> {
    ctx.transitionTo(RunStatus.TRANSFORMING);
    const output = this.transformer.transformAll(rows, this.specs);
    ctx.transformed = output.length;
    ctx.emit({
      type: 'transform:completed',
      runId: ctx.runId,
      inputRecords: rows.length,
      outputRecords: output.length,
      timestamp: ctx.now(),
    });
    return output;
  }
}
