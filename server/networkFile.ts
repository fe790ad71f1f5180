import fs from 'node:fs';
import path from 'node:path';
import { SerializationError } from '../src/errors.ts';
import type { NeuralNetwork } from '../src/network.ts';
import { loadNetwork, saveNetwork } from '../src/networkSerializer.ts';

/**
 * Writes a network to disk, creating parent directories. The file is
 * replaced through a temporary sibling so readers never see half a write.
 */
export function writeNetworkFile(filePath: string, net: NeuralNetwork): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  fs.writeFileSync(tmp, saveNetwork(net));
  fs.renameSync(tmp, filePath);
}

/**
 * @throws SerializationError when the file is missing, unreadable or malformed.
 */
export function readNetworkFile(filePath: string): NeuralNetwork {
  let bytes: Uint8Array;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (err) {
    throw new SerializationError(`cannot read network file ${filePath}`, { cause: err });
  }
  return loadNetwork(bytes);
}
