import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { SerializationError } from '../src/errors.ts';
import { NeuralNetwork } from '../src/network.ts';
import { createRng } from '../src/rng.ts';
import { readNetworkFile, writeNetworkFile } from './networkFile.ts';

/** Test suite label for network files. */
const SUITE = 'networkFile';

const tmpDirs: string[] = [];

function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snake-net-'));
  tmpDirs.push(dir);
  return dir;
}

describe(SUITE, () => {
  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes into new directories and reads back the same network', () => {
    const file = path.join(tempDir(), 'nested', 'best.json');
    const net = NeuralNetwork.random({ layerSizes: [3, 4, 2], hiddenActivation: 'tanh', outputActivation: 'linear' }, createRng(12));
    writeNetworkFile(file, net);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
    expect(readNetworkFile(file).equals(net)).toBe(true);
  });

  it('reports missing and malformed files as serialization errors', () => {
    const dir = tempDir();
    const missing = path.join(dir, 'missing.json');
    expect(() => readNetworkFile(missing)).toThrow(SerializationError);
    expect(() => readNetworkFile(missing)).toThrow(`cannot read network file ${missing}`);
    const bad = path.join(dir, 'bad.json');
    fs.writeFileSync(bad, '{"version":1}');
    expect(() => readNetworkFile(bad)).toThrow(SerializationError);
  });
});
