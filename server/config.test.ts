import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadTomlConfig, normalizeConfig, parseConfig } from './config.ts';

/** Test suite label for server config loading. */
const SUITE = 'server config';

const tmpDirs: string[] = [];

function writeTemp(name: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snake-config-'));
  tmpDirs.push(dir);
  const file = path.join(dir, name);
  fs.writeFileSync(file, contents);
  return file;
}

function collect(): { warnings: string[]; warn: (msg: string) => void } {
  const warnings: string[] = [];
  return { warnings, warn: msg => warnings.push(msg) };
}

describe(SUITE, () => {
  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults when nothing is set', () => {
    const { warnings, warn } = collect();
    const config = parseConfig([], {}, warn);
    const { simulation, ...server } = config;
    expect(server).toEqual(DEFAULT_CONFIG);
    expect(simulation.populationSize).toBe(500);
    expect(warnings).toEqual([]);
  });

  it('lets flags win over environment variables', () => {
    const { warnings, warn } = collect();
    const config = parseConfig(
      ['--port=8081', '--low-detail', '--seed', '9'],
      { PORT: '9000', TICK_RATE: '60', UI_RATE: '120', WORKERS: '3' },
      warn
    );
    expect(config.port).toBe(8081);
    expect(config.lowDetail).toBe(true);
    expect(config.workers).toBe(3);
    expect(config.tickRateHz).toBe(60);
    expect(config.uiFrameRateHz).toBe(60);
    expect(config.simulation.seed).toBe(9);
    expect(warnings).toEqual(['uiFrameRateHz exceeded tickRateHz; clamping to tickRateHz.']);
  });

  it('reads LOW_DETAIL from the environment', () => {
    expect(parseConfig([], { LOW_DETAIL: 'true' }, () => {}).lowDetail).toBe(true);
    expect(parseConfig([], { LOW_DETAIL: '0' }, () => {}).lowDetail).toBe(false);
  });

  it('layers a TOML file under environment overrides', () => {
    const file = writeTemp(
      'run.toml',
      [
        'port = 6000',
        'workers = 2',
        'logLevel = "debug"',
        '[simulation]',
        'boardSize = 12',
        'hiddenLayers = [8]',
        '[[simulation.starvationScaling]]',
        'minLength = 6',
        'factor = 2',
        ''
      ].join('\n')
    );
    const config = parseConfig(['--config', file], { BOARD_SIZE: '20' }, () => {});
    expect(config.port).toBe(6000);
    expect(config.workers).toBe(2);
    expect(config.logLevel).toBe('debug');
    expect(config.simulation.boardSize).toBe(20);
    expect(config.simulation.hiddenLayers).toEqual([8]);
    expect(config.simulation.starvationSteps).toBe(400);
    expect(config.simulation.starvationScaling).toEqual([{ minLength: 6, factor: 2 }]);
  });

  it('accepts the bundled sample file', () => {
    const { warnings, warn } = collect();
    const sample = fileURLToPath(new URL('./config.toml', import.meta.url));
    const config = parseConfig([], { SNAKE_CONFIG: sample }, warn);
    expect(warnings).toEqual([]);
    expect(config.checkpointEveryGenerations).toBe(10);
    expect(config.simulation.starvationScaling).toHaveLength(3);
    expect(config.simulation.fitness.stepWeight).toBe(0.5);
  });

  it('fails on unreadable or malformed files', () => {
    const missing = path.join(os.tmpdir(), 'snake-config-missing', 'none.toml');
    expect(() => loadTomlConfig(missing)).toThrow(`cannot read config file ${missing}`);
    const bad = writeTemp('bad.toml', 'port = = 3\n');
    expect(() => loadTomlConfig(bad)).toThrow(/^failed to parse/);
  });

  it('repairs invalid values with warnings', () => {
    const { warnings, warn } = collect();
    const config = normalizeConfig({ host: '', port: 70000, logLevel: 'loud', simulation: { boardSize: 100 } }, warn);
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(65535);
    expect(config.logLevel).toBe('info');
    expect(config.simulation.boardSize).toBe(64);
    expect(warnings).toEqual([
      'host is invalid; using 127.0.0.1.',
      'port was clamped to 65535.',
      'logLevel "loud" is invalid; using info.',
      'simulation.boardSize was clamped to 64.'
    ]);
  });
});
