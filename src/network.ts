// network.ts
// Fixed-topology feedforward network used as a snake's brain. Parameters
// live in one flat Float32Array so breeding can treat them as a genome.

import { ShapeMismatchError } from './errors.ts';
import { randomRange, type RandomSource } from './rng.ts';

export type Activation = 'relu' | 'tanh' | 'sigmoid' | 'linear';

export const ACTIVATIONS: readonly Activation[] = ['relu', 'tanh', 'sigmoid', 'linear'];

export interface NetworkShape {
  /** Neuron count per layer, input layer first. */
  layerSizes: number[];
  hiddenActivation: Activation;
  outputActivation: Activation;
}

/** Row-major view of one layer, used by persistence and breeding. */
export interface LayerView {
  /** outputs × inputs */
  weights: number[][];
  biases: number[];
}

/**
 * Produces a stable key for a topology, e.g. "32x16x8x3".
 */
export function topologyKey(layerSizes: readonly number[]): string {
  return layerSizes.join('x');
}

/**
 * Number of parameters (weights and biases) a topology needs.
 */
export function paramCount(layerSizes: readonly number[]): number {
  let n = 0;
  for (let l = 0; l < layerSizes.length - 1; l++) {
    const ins = layerSizes[l] ?? 0;
    const outs = layerSizes[l + 1] ?? 0;
    // Each output has ins weights plus one bias term.
    n += outs * ins + outs;
  }
  return n;
}

export function activate(kind: Activation, x: number): number {
  switch (kind) {
    case 'relu':
      return x > 0 ? x : 0;
    case 'tanh':
      return Math.tanh(x);
    case 'sigmoid':
      return 1 / (1 + Math.exp(-x));
    case 'linear':
      return x;
  }
}

/**
 * Index of the largest value; the lowest index wins ties.
 */
export function argmax(values: ArrayLike<number>): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if ((values[i] ?? -Infinity) > (values[best] ?? -Infinity)) best = i;
  }
  return best;
}

function assertShape(shape: NetworkShape): void {
  const sizes = shape.layerSizes;
  if (sizes.length < 2) {
    throw new ShapeMismatchError('layer count', 'at least 2', sizes.length);
  }
  for (const size of sizes) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new ShapeMismatchError('layer size', 'a positive integer', String(size));
    }
  }
}

/**
 * Feedforward network. Layer l maps layerSizes[l] inputs to
 * layerSizes[l + 1] outputs; per output the layout is its input weights
 * followed by its bias.
 */
export class NeuralNetwork {
  readonly layerSizes: readonly number[];
  readonly hiddenActivation: Activation;
  readonly outputActivation: Activation;
  readonly key: string;
  readonly paramCount: number;
  readonly params: Float32Array;

  constructor(shape: NetworkShape, params: Float32Array | null = null) {
    assertShape(shape);
    // Copy sizes to avoid accidental mutation by caller.
    this.layerSizes = shape.layerSizes.slice();
    this.hiddenActivation = shape.hiddenActivation;
    this.outputActivation = shape.outputActivation;
    this.key = topologyKey(this.layerSizes);
    this.paramCount = paramCount(this.layerSizes);
    if (params && params.length !== this.paramCount) {
      throw new ShapeMismatchError(`parameters for ${this.key}`, this.paramCount, params.length);
    }
    this.params = params ? params.slice() : new Float32Array(this.paramCount);
  }

  /**
   * Network with every parameter drawn uniformly from [-initRange, initRange).
   */
  static random(shape: NetworkShape, rng: RandomSource, initRange = 1): NeuralNetwork {
    const net = new NeuralNetwork(shape);
    for (let i = 0; i < net.paramCount; i++) {
      net.params[i] = randomRange(rng, -initRange, initRange);
    }
    return net;
  }

  get inputSize(): number {
    return this.layerSizes[0] ?? 0;
  }

  get outputSize(): number {
    return this.layerSizes[this.layerSizes.length - 1] ?? 0;
  }

  get layerCount(): number {
    return this.layerSizes.length - 1;
  }

  shape(): NetworkShape {
    return {
      layerSizes: this.layerSizes.slice(),
      hiddenActivation: this.hiddenActivation,
      outputActivation: this.outputActivation
    };
  }

  /**
   * Offset of layer l's first parameter inside params.
   */
  layerOffset(l: number): number {
    return paramCount(this.layerSizes.slice(0, l + 1));
  }

  /**
   * Forward pass. Allocates its own buffers, so concurrent callers never
   * observe each other's activations.
   */
  forward(input: ArrayLike<number>): Float32Array {
    if (input.length !== this.inputSize) {
      throw new ShapeMismatchError('vision length', this.inputSize, input.length);
    }
    const w = this.params;
    const last = this.layerCount - 1;
    let wi = 0;
    let cur: ArrayLike<number> = input;
    let next = new Float32Array(0);
    for (let l = 0; l <= last; l++) {
      const ins = this.layerSizes[l] ?? 0;
      const outs = this.layerSizes[l + 1] ?? 0;
      const fn = l === last ? this.outputActivation : this.hiddenActivation;
      next = new Float32Array(outs);
      for (let o = 0; o < outs; o++) {
        let sum = 0;
        for (let i = 0; i < ins; i++) sum += w[wi++] * (cur[i] ?? 0);
        sum += w[wi++]; // bias
        next[o] = activate(fn, sum);
      }
      cur = next;
    }
    return next;
  }

  /**
   * Index of the chosen output for this input.
   */
  decide(input: ArrayLike<number>): number {
    return argmax(this.forward(input));
  }

  layer(l: number): LayerView {
    const ins = this.layerSizes[l] ?? 0;
    const outs = this.layerSizes[l + 1] ?? 0;
    let idx = this.layerOffset(l);
    const weights: number[][] = [];
    const biases: number[] = [];
    for (let o = 0; o < outs; o++) {
      weights.push(Array.from(this.params.subarray(idx, idx + ins)));
      idx += ins;
      biases.push(this.params[idx++] ?? 0);
    }
    return { weights, biases };
  }

  clone(): NeuralNetwork {
    return new NeuralNetwork(this.shape(), this.params);
  }

  /**
   * True when both networks share topology, activations and every parameter.
   */
  equals(other: NeuralNetwork): boolean {
    if (this.key !== other.key) return false;
    if (this.hiddenActivation !== other.hiddenActivation) return false;
    if (this.outputActivation !== other.outputActivation) return false;
    for (let i = 0; i < this.paramCount; i++) {
      if (!Object.is(this.params[i], other.params[i])) return false;
    }
    return true;
  }
}
