import type { Sample } from "./config";
import { logger as defaultLogger, type Logger } from "./log";
import { Losses } from "./Losses";
import { NeuralNet } from "./NeuralNet";
import { SGD } from "./Optimizers";
import { Value } from "./Value";

export interface TrainOptions {
  iterations: number;
  learningRate: number;
  /** Log the loss every N iterations; 0 disables progress lines. */
  logEvery?: number;
  logger?: Logger;
}

export interface TrainingHistory {
  /** Loss before each iteration's update. */
  losses: number[];
  initialLoss: number;
  finalLoss: number;
}

function checkSample(net: NeuralNet, sample: Sample, index: number): void {
  if (sample.inputs.length !== net.inputSize) {
    throw new Error(`Sample ${index} has ${sample.inputs.length} inputs, network expects ${net.inputSize}`);
  }
  if (sample.targets.length !== net.outputSize) {
    throw new Error(`Sample ${index} has ${sample.targets.length} targets, network produces ${net.outputSize}`);
  }
}

/**
 * Builds the mean-squared-error loss of `net` over the whole dataset.
 * Inputs and targets are fresh constant leaves on every call.
 */
export function datasetLoss(net: NeuralNet, dataset: Sample[]): Value {
  const predicted: Value[] = [];
  const expected: Value[] = [];
  for (const sample of dataset) {
    predicted.push(...net.forward(sample.inputs.map(x => new Value(x))));
    expected.push(...sample.targets.map(t => new Value(t)));
  }
  return Losses.mse(predicted, expected);
}

/**
 * Full-batch gradient descent: forward over every sample, one backward pass on
 * the loss, one SGD step on every weight and bias. Repeats `iterations` times.
 */
export function train(net: NeuralNet, dataset: Sample[], opts: TrainOptions): TrainingHistory {
  if (dataset.length === 0) {
    throw new Error("Cannot train on an empty dataset");
  }
  dataset.forEach((sample, i) => checkSample(net, sample, i));

  const log = opts.logger ?? defaultLogger;
  const logEvery = opts.logEvery ?? 0;
  const optimizer = new SGD(net.parameters(), { learningRate: opts.learningRate });
  const losses: number[] = [];

  for (let i = 0; i < opts.iterations; i++) {
    const loss = datasetLoss(net, dataset);
    losses.push(loss.data);
    if (logEvery > 0 && i % logEvery === 0) {
      log.info(`iteration ${i}: loss=${loss.data}`);
    }
    loss.backward();
    optimizer.step();
  }

  const history: TrainingHistory = {
    losses,
    initialLoss: losses.length > 0 ? losses[0] : NaN,
    finalLoss: datasetLoss(net, dataset).data,
  };
  log.debug(`trained ${opts.iterations} iterations: loss ${history.initialLoss} -> ${history.finalLoss}`);
  return history;
}

export function meanLoss(losses: number[]): number {
  if (losses.length === 0) return NaN;
  return losses.reduce((sum, l) => sum + l, 0) / losses.length;
}
