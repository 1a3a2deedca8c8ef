import { logger, type LogSink } from './log';
import { uniform, type RandomSource } from './Random';
import { Value } from './Value';
import { ValueArithmetic } from './ValueArithmetic';

export type Activation = 'linear' | 'relu';

/**
 * Options shared by neurons, layers and networks.
 * @property random: Source for weight/bias initialization (default Math.random).
 * @property activation: Applied to each neuron's weighted sum (default 'linear').
 */
export interface NeuronOptions {
  random?: RandomSource;
  activation?: Activation;
}

export interface NeuralNetOptions {
  random?: RandomSource;
  /** Activation of every layer but the last, which is always linear. */
  hiddenActivation?: Activation;
}

/** Plain-number snapshot of one neuron's parameters. */
export interface NeuronParameters {
  weights: number[];
  bias: number;
}

/**
 * A single neuron: multiplies each input by its weight and adds the bias.
 * Weights and bias start uniformly in [-1, 1).
 */
export class Neuron {
  readonly weights: Value[];
  readonly bias: Value;
  readonly activation: Activation;

  constructor(inputs: number, opts: NeuronOptions = {}) {
    const random = opts.random ?? Math.random;
    this.weights = Array.from({ length: inputs }, (_, i) => new Value(uniform(random, -1, 1), `w${i}`));
    this.bias = new Value(uniform(random, -1, 1), 'b');
    this.activation = opts.activation ?? 'linear';
  }

  forward(inputs: Value[]): Value {
    if (inputs.length !== this.weights.length) {
      throw new Error(`Neuron expects ${this.weights.length} inputs, got ${inputs.length}`);
    }
    const products = this.weights.map((w, i) => w.mul(inputs[i]));
    const weighted = products.length > 0 ? ValueArithmetic.sum(products) : new Value(0);
    const out = weighted.add(this.bias);
    return this.activation === 'relu' ? out.relu() : out;
  }

  parameters(): Value[] {
    return [...this.weights, this.bias];
  }

  describe(): NeuronParameters {
    return { weights: this.weights.map(w => w.data), bias: this.bias.data };
  }
}

/**
 * A fixed-width layer of neurons, all reading the same inputs.
 */
export class Layer {
  readonly neurons: Neuron[];

  constructor(inputSize: number, outputSize: number, opts: NeuronOptions = {}) {
    this.neurons = Array.from({ length: outputSize }, () => new Neuron(inputSize, opts));
  }

  forward(inputs: Value[]): Value[] {
    return this.neurons.map(n => n.forward(inputs));
  }

  parameters(): Value[] {
    return this.neurons.flatMap(n => n.parameters());
  }
}

/**
 * Feed-forward stack of layers between consecutive sizes in `layerSizes`.
 * @public
 */
export class NeuralNet {
  readonly layers: Layer[];

  constructor(readonly layerSizes: number[], opts: NeuralNetOptions = {}) {
    if (layerSizes.length < 2) {
      throw new Error(`NeuralNet needs at least an input and an output size, got [${layerSizes.join(', ')}]`);
    }
    for (const size of layerSizes) {
      if (!Number.isInteger(size) || size < 1) {
        throw new Error(`Layer sizes must be positive integers, got ${size}`);
      }
    }
    const hidden = opts.hiddenActivation ?? 'linear';
    this.layers = [];
    for (let i = 0; i < layerSizes.length - 1; i++) {
      const isLast = i === layerSizes.length - 2;
      this.layers.push(new Layer(layerSizes[i], layerSizes[i + 1], {
        random: opts.random,
        activation: isLast ? 'linear' : hidden,
      }));
    }
  }

  get inputSize(): number {
    return this.layerSizes[0];
  }

  get outputSize(): number {
    return this.layerSizes[this.layerSizes.length - 1];
  }

  forward(inputs: Value[]): Value[] {
    let output = inputs;
    for (const layer of this.layers) {
      output = layer.forward(output);
    }
    return output;
  }

  /** Forward pass on plain numbers, returning plain numbers. */
  predict(inputs: number[]): number[] {
    return this.forward(inputs.map(x => new Value(x))).map(v => v.data);
  }

  parameters(): Value[] {
    return this.layers.flatMap(l => l.parameters());
  }

  describe(): NeuronParameters[][] {
    return this.layers.map(l => l.neurons.map(n => n.describe()));
  }

  dump(sink: LogSink = (line) => logger.info(line)): void {
    for (const layer of this.describe()) {
      sink('layer');
      for (const neuron of layer) {
        sink(`w=[${neuron.weights.join(', ')}], b=${neuron.bias}`);
      }
    }
  }
}
