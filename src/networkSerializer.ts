/** JSON codec for trained networks, shared by the best-network file and the HTTP export. */

import { SerializationError, ShapeMismatchError } from './errors.ts';
import { ACTIVATIONS, NeuralNetwork, type Activation, type LayerView } from './network.ts';
import { isRecord } from './utils.ts';

export const NETWORK_FORMAT_VERSION = 1;

/** On-disk shape of a saved network. */
export interface NetworkJSON {
  version: number;
  layerSizes: number[];
  hiddenActivation: Activation;
  outputActivation: Activation;
  layers: LayerView[];
}

/**
 * Converts a network to its JSON form.
 * @param net - Network to convert.
 */
export function networkToJSON(net: NeuralNetwork): NetworkJSON {
  const layers: LayerView[] = [];
  for (let l = 0; l < net.layerCount; l++) layers.push(net.layer(l));
  return {
    version: NETWORK_FORMAT_VERSION,
    layerSizes: net.layerSizes.slice(),
    hiddenActivation: net.hiddenActivation,
    outputActivation: net.outputActivation,
    layers
  };
}

function readActivation(value: unknown, field: string): Activation {
  const match = ACTIVATIONS.find(a => a === value);
  if (match === undefined) throw new SerializationError(`${field} must be one of ${ACTIVATIONS.join(', ')}`);
  return match;
}

function readNumberArray(value: unknown, length: number, field: string): number[] {
  if (!Array.isArray(value) || value.length !== length) {
    throw new SerializationError(`${field} must be an array of ${length} numbers`);
  }
  const out: number[] = [];
  for (const v of value) {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new SerializationError(`${field} contains a non-numeric value`);
    }
    out.push(v);
  }
  return out;
}

/**
 * Rebuilds a network from its JSON form, validating every field.
 * @param data - Parsed JSON value.
 */
export function networkFromJSON(data: unknown): NeuralNetwork {
  if (!isRecord(data)) throw new SerializationError('network data must be an object');
  if (data['version'] !== NETWORK_FORMAT_VERSION) {
    throw new SerializationError(`unsupported network format version ${String(data['version'])}`);
  }
  const sizesRaw = data['layerSizes'];
  if (!Array.isArray(sizesRaw) || sizesRaw.length < 2) {
    throw new SerializationError('layerSizes must list at least two layers');
  }
  const layerSizes = readNumberArray(sizesRaw, sizesRaw.length, 'layerSizes');
  if (layerSizes.some(size => !Number.isInteger(size) || size <= 0)) {
    throw new SerializationError('layerSizes must be positive integers');
  }
  const hiddenActivation = readActivation(data['hiddenActivation'], 'hiddenActivation');
  const outputActivation = readActivation(data['outputActivation'], 'outputActivation');
  const layers = data['layers'];
  if (!Array.isArray(layers) || layers.length !== layerSizes.length - 1) {
    throw new SerializationError(`layers must hold ${layerSizes.length - 1} entries`);
  }

  const net = new NeuralNetwork({ layerSizes, hiddenActivation, outputActivation });
  let idx = 0;
  layers.forEach((layer: unknown, l: number) => {
    const ins = layerSizes[l] ?? 0;
    const outs = layerSizes[l + 1] ?? 0;
    if (!isRecord(layer)) throw new SerializationError(`layers[${l}] must be an object`);
    const rows = layer['weights'];
    if (!Array.isArray(rows) || rows.length !== outs) {
      throw new SerializationError(`layers[${l}].weights must have ${outs} rows`);
    }
    const biases = readNumberArray(layer['biases'], outs, `layers[${l}].biases`);
    rows.forEach((row: unknown, o: number) => {
      const weights = readNumberArray(row, ins, `layers[${l}].weights[${o}]`);
      net.params.set(weights, idx);
      idx += ins;
      net.params[idx++] = biases[o] ?? 0;
    });
  });
  return net;
}

/**
 * Encodes a network as pretty-printed UTF-8 JSON.
 */
export function saveNetwork(net: NeuralNetwork): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(networkToJSON(net), null, 2));
}

/**
 * Decodes bytes written by saveNetwork.
 * @throws SerializationError on malformed input.
 */
export function loadNetwork(bytes: Uint8Array): NeuralNetwork {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    throw new SerializationError('network data is not valid JSON', { cause: err });
  }
  return networkFromJSON(parsed);
}

/**
 * Fails with ShapeMismatchError unless the network takes the expected layer chain.
 */
export function assertTopology(net: NeuralNetwork, layerSizes: readonly number[]): void {
  const expected = layerSizes.join('x');
  if (net.key !== expected) throw new ShapeMismatchError('loaded network topology', expected, net.key);
}
