/**
 * Pipelines chain the steps held by their task fields
 */

import { CheckpointError } from './errors.js';
import { getLogger } from './logger.js';
import { Step } from './step.js';
import { TaskField } from './task.js';

/**
 * A step made of other steps, one per declared task, run in declaration order
 *
 * @example
 * class Normalize extends Pipeline {
 *   declare scale: Step;
 *   declare shift: Step;
 * }
 * declareFields(Normalize, {
 *   scale: task((x: number) => x * 2),
 *   shift: task((x: number) => x - 1, { isOutput: true }),
 * });
 */
export class Pipeline extends Step<unknown, unknown> {
  /**
   * Task name to the step currently held by that task
   */
  tasks(): Map<string, Step> {
    const steps = new Map<string, Step>();
    for (const [name, declaration] of this.collect(TaskField)) {
      steps.set(name, declaration.getValue(this));
    }
    return steps;
  }

  /**
   * Run every step on the output of the previous one
   *
   * Returns the last output when no step is flagged with `isOutput`, the output of the
   * single flagged step, or the outputs of all flagged steps in pipeline order.
   */
  operation(input: unknown): unknown {
    const outputs: unknown[] = [];
    let data = input;
    for (const [name, step] of this.tasks()) {
      getLogger().debug('Running task', { pipeline: this.constructor.name, task: name });
      data = step.invoke(data);
      if (step.isOutput) {
        outputs.push(data);
      }
    }
    if (outputs.length === 0) return data;
    if (outputs.length === 1) return outputs[0];
    return outputs;
  }

  /**
   * Steps from the last checkpoint to the end, in pipeline order
   */
  checkpointSteps(): Step[] {
    const steps: Step[] = [];
    for (const step of [...this.tasks().values()].reverse()) {
      steps.unshift(step);
      if (step.isCheckpoint) {
        return steps;
      }
    }
    throw new CheckpointError('No checkpoints were defined.');
  }

  /**
   * Rerun the steps after the last checkpoint on its stored output
   */
  resumeFromCheckpoint(): unknown {
    const [checkpoint, ...rest] = this.checkpointSteps();
    if (checkpoint.checkpointData === undefined) {
      throw new CheckpointError(
        'No checkpoint data found, the whole pipeline must be run first for a checkpoint to exist.'
      );
    }
    let data: unknown = checkpoint.checkpointData;
    for (const step of rest) {
      data = step.invoke(data);
    }
    return data;
  }

  toString(): string {
    const lines = [...this.tasks().values()].map((step) => `    ${step.toString()}`);
    return `${this.constructor.name}(\n${lines.join('\n')}\n)`;
  }
}
