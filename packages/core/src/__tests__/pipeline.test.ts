/**
 * Pipeline tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { CheckpointError } from '../errors.js';
import { HierarchicalStorage } from '../hierarchicalStorage.js';
import { Pipeline } from '../pipeline.js';
import { FunctionStep, functionStep, Step } from '../step.js';
import { task } from '../task.js';
import { declareFields } from '../tracker.js';

class Arithmetic extends Pipeline {
  declare increment: Step;
  declare double: Step;
  declare decrement: Step;
}

declareFields(Arithmetic, {
  increment: task((x: number) => x + 1, { isOutput: true }),
  double: task((x: number) => x * 2),
  decrement: task((x: number) => x - 1, { isOutput: true }),
});

class Plain extends Pipeline {
  declare add: Step;
  declare triple: Step;
}

declareFields(Plain, {
  add: task((x: number) => x + 1),
  triple: task((x: number) => x * 3),
});

class Single extends Pipeline {
  declare only: Step;
}

declareFields(Single, {
  only: task(function double(x: number) {
    return x * 2;
  }),
});

class Counter extends Step<number, number> {
  calls = 0;

  operation(input: number): number {
    this.calls += 1;
    return input * 2;
  }
}

class Resumable extends Pipeline {
  declare load: Step;
  declare expensive: Step;
  declare finish: Step;
}

declareFields(Resumable, {
  load: task(),
  expensive: task(),
  finish: task(),
});

describe('Pipeline.operation', () => {
  it('should collect the outputs of flagged steps', () => {
    expect(new Arithmetic().invoke(5)).toEqual([6, 11]);
  });

  it('should return the last output when no step is flagged', () => {
    expect(new Plain().invoke(2)).toBe(9);
  });

  it('should return a single flagged output directly', () => {
    const pipeline = new Plain({ add: new FunctionStep((x: number) => x + 1, { isOutput: true }) });

    expect(pipeline.invoke(2)).toBe(3);
  });

  it('should use replaced tasks', () => {
    expect(new Arithmetic({ double: (x: number) => x * 10 }).invoke(5)).toEqual([6, 59]);
    expect(new Arithmetic().at({ decrement: functionStep((x: number) => x, { isOutput: true }) }).invoke(5)).toEqual([6, 12]);
    expect(new Arithmetic().at({ decrement: (x: number) => x }).invoke(5)).toBe(6);
  });

  it('should list its tasks in declaration order', () => {
    const pipeline = new Arithmetic();

    expect([...pipeline.tasks().keys()]).toEqual(['increment', 'double', 'decrement']);
    expect(pipeline.tasks().get('double')).toBe(pipeline.double);
  });

  it('should be usable as a step of another pipeline', () => {
    class Outer extends Pipeline {
      declare inner: Step;
      declare shift: Step;
    }
    declareFields(Outer, {
      inner: task(new Plain()),
      shift: task((x: number) => x - 9),
    });

    expect(new Outer().invoke(2)).toBe(0);
  });
});

describe('Pipeline checkpoints', () => {
  function build(): { pipeline: Resumable; expensive: Counter } {
    const expensive = new Counter({ isCheckpoint: true });
    const pipeline = new Resumable({
      load: (x: number) => x + 1,
      expensive,
      finish: (x: number) => x + 100,
    });
    return { pipeline, expensive };
  }

  it('should return the steps from the last checkpoint on', () => {
    const { pipeline, expensive } = build();

    expect(pipeline.checkpointSteps()).toEqual([expensive, pipeline.finish]);
  });

  it('should pick the last of several checkpoints', () => {
    const { pipeline } = build();
    pipeline.finish.setDefault('isCheckpoint', true);

    expect(pipeline.checkpointSteps()).toEqual([pipeline.finish]);
  });

  it('should resume from the checkpoint without rerunning earlier steps', () => {
    const { pipeline, expensive } = build();

    expect(pipeline.invoke(1)).toBe(104);
    expect(pipeline.resumeFromCheckpoint()).toBe(104);
    expect(expensive.calls).toBe(1);
  });

  it('should match a full run after a change behind the checkpoint', () => {
    const { pipeline, expensive } = build();
    pipeline.invoke(1);
    pipeline.cell('finish').value = (x: number) => x - 100;

    const resumed = pipeline.resumeFromCheckpoint();
    expect(resumed).toBe(-96);
    expect(expensive.calls).toBe(1);
    expect(pipeline.invoke(1)).toBe(resumed);
  });

  it('should return the checkpoint data when the checkpoint is the last step', () => {
    const { pipeline } = build();
    pipeline.finish.setDefault('isCheckpoint', true);
    pipeline.invoke(1);

    expect(pipeline.resumeFromCheckpoint()).toBe(104);
  });

  it('should fail without checkpoints', () => {
    expect(() => new Plain().checkpointSteps()).toThrow(CheckpointError);
    expect(() => new Plain().resumeFromCheckpoint()).toThrow('No checkpoints were defined.');
  });

  it('should fail before the checkpoint has data', () => {
    const { pipeline } = build();

    expect(() => pipeline.resumeFromCheckpoint()).toThrow(
      'No checkpoint data found, the whole pipeline must be run first for a checkpoint to exist.'
    );
  });
});

describe('Pipeline caching', () => {
  let testRoot: string;

  beforeEach(async () => {
    testRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeboard-pipeline-test-'));
  });

  afterEach(async () => {
    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should cache per step and key entries by configuration', () => {
    const cache = new HierarchicalStorage(testRoot);
    const counter = new Counter({ cache });
    const first = new Plain({ add: (x: number) => x + 1, triple: counter });

    expect(first.invoke(2)).toBe(6);
    expect(first.invoke(2)).toBe(6);
    expect(counter.calls).toBe(1);
    expect(cache.keys()).toHaveLength(1);
  });

  it('should cache whole pipelines and tell configurations apart', () => {
    const cache = new HierarchicalStorage(testRoot);

    expect(new Plain({ cache }).invoke(2)).toBe(9);
    expect(new Plain({ cache, triple: (x: number) => x * 4 }).invoke(2)).toBe(12);
    expect(cache.keys()).toHaveLength(2);
    expect(new Plain({ cache }).invoke(2)).toBe(9);
    expect(cache.keys()).toHaveLength(2);
  });
});

describe('Pipeline.toString', () => {
  it('should list the task steps', () => {
    expect(new Single().toString()).toBe('Single(\n    FunctionStep(cache=NoStorage, fn=double) -> unknown\n)');
  });
});
