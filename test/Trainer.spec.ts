import { describe, it, expect } from 'vitest';
import { DEFAULT_DATASET } from '../src/config';
import { createLogger } from '../src/log';
import { NeuralNet } from '../src/NeuralNet';
import { createRandom } from '../src/Random';
import { datasetLoss, meanLoss, train } from '../src/Trainer';
import { lineCollector, testLog } from './testUtils';

const quiet = createLogger({ verbose: false, sink: () => {} });

describe('datasetLoss', () => {
  it('is the mean squared error over all samples', () => {
    const net = new NeuralNet([1, 1], { random: () => 0.75 });
    const loss = datasetLoss(net, [{ inputs: [2], targets: [3] }]);
    expect(loss.data).toBe(2.25);
  });
});

describe('train', () => {
  it('applies one exact gradient step per iteration', () => {
    const net = new NeuralNet([1, 1], { random: () => 0.75 });
    const history = train(net, [{ inputs: [2], targets: [3] }], {
      iterations: 1,
      learningRate: 0.1,
      logger: quiet,
    });
    const [neuron] = net.layers[0].neurons;
    expect(history.losses).toEqual([2.25]);
    expect(history.initialLoss).toBe(2.25);
    expect(neuron.weights[0].data).toBeCloseTo(1.1, 12);
    expect(neuron.bias.data).toBeCloseTo(0.8, 12);
    expect(history.finalLoss).toBeCloseTo(0, 12);
  });

  it('reduces the error of a linear model w*x + b', () => {
    const net = new NeuralNet([1, 1], { random: createRandom(5) });
    const history = train(net, [{ inputs: [3], targets: [7] }], {
      iterations: 1000,
      learningRate: 1e-4,
      logger: quiet,
    });
    testLog('initial', history.initialLoss, 'mean', meanLoss(history.losses), 'final', history.finalLoss);
    expect(history.losses).toHaveLength(1000);
    expect(meanLoss(history.losses)).toBeLessThan(history.initialLoss);
    expect(history.finalLoss).toBeLessThan(history.initialLoss);
  });

  it('learns the default sum dataset', () => {
    const net = new NeuralNet([2, 1], { random: createRandom(2024) });
    const history = train(net, DEFAULT_DATASET, {
      iterations: 1000,
      learningRate: 1e-4,
      logger: quiet,
    });
    expect(meanLoss(history.losses)).toBeLessThan(history.initialLoss);
    expect(history.finalLoss).toBeLessThan(history.initialLoss);
  });

  it('logs the loss every logEvery iterations', () => {
    const { lines, sink } = lineCollector();
    const net = new NeuralNet([1, 1], { random: () => 0.75 });
    const history = train(net, [{ inputs: [2], targets: [3] }], {
      iterations: 10,
      learningRate: 0.01,
      logEvery: 5,
      logger: createLogger({ verbose: false, sink }),
    });
    expect(lines).toEqual([
      `iteration 0: loss=${history.losses[0]}`,
      `iteration 5: loss=${history.losses[5]}`,
    ]);
  });

  it('writes a summary at debug level', () => {
    const { lines, sink } = lineCollector();
    const net = new NeuralNet([1, 1], { random: () => 0.75 });
    const history = train(net, [{ inputs: [2], targets: [3] }], {
      iterations: 2,
      learningRate: 0.01,
      logger: createLogger({ verbose: true, sink }),
    });
    expect(lines).toEqual([`trained 2 iterations: loss ${history.initialLoss} -> ${history.finalLoss}`]);
  });

  it('rejects samples that do not fit the network', () => {
    const net = new NeuralNet([2, 1]);
    const opts = { iterations: 1, learningRate: 0.1, logger: quiet };
    expect(() => train(net, [{ inputs: [1], targets: [1] }], opts)).toThrow(
      'Sample 0 has 1 inputs, network expects 2'
    );
    expect(() => train(net, [{ inputs: [1, 2], targets: [1, 2] }], opts)).toThrow(
      'Sample 0 has 2 targets, network produces 1'
    );
    expect(() => train(net, [], opts)).toThrow('Cannot train on an empty dataset');
  });
});

describe('meanLoss', () => {
  it('averages a loss history', () => {
    expect(meanLoss([1, 2, 3])).toBe(2);
    expect(meanLoss([])).toBeNaN();
  });
});
