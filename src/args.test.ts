import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseArgs, resolveRunConfig } from './args.js';
import { EventsConfigSchema } from './config.js';
import { logger } from './logger.js';
import { parseFlag, parsePositiveIntList } from './utils.js';

logger.setConsoleOutputEnabled(false);

// --- Helpers ---

function tempDir(files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'multicast-run-'));
  for (const [name, contents] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), contents);
  }
  return dir;
}

test('parseArgs: defaults', () => {
  assert.deepEqual(parseArgs([]), {
    configFile: undefined,
    sizes: undefined,
    runs: undefined,
    logLevel: undefined,
    trace: false,
    quiet: false,
  });
});

test('parseArgs: flags, values and a positional config file', () => {
  const args = parseArgs(['--', 'bench.yaml', '--sizes', '10, 20', '--runs', '5', '--trace', '-q']);

  assert.deepEqual(args, {
    configFile: 'bench.yaml',
    sizes: [10, 20],
    runs: 5,
    logLevel: undefined,
    trace: true,
    quiet: true,
  });
});

test('parseArgs: --config takes precedence over a later positional', () => {
  assert.equal(parseArgs(['--config', 'a.yaml', 'b.yaml']).configFile, 'a.yaml');
});

test('parseArgs: rejects bad input', () => {
  assert.throws(() => parseArgs(['--runs']), /Missing value for --runs/);
  assert.throws(() => parseArgs(['--runs', '0']), /Invalid run count "0"/);
  assert.throws(() => parseArgs(['--sizes', '10,x']), /Invalid positive integer "x"/);
  assert.throws(() => parseArgs(['--verbose']), /Unknown argument: --verbose/);
  assert.throws(() => parseArgs(['--log-level', 'loud']), /Invalid log level "loud"/);
});

test('parseArgs: --log-level is case-insensitive', () => {
  assert.equal(parseArgs(['--log-level', 'WARN']).logLevel, 'warn');
});

// --- resolveRunConfig ---

test('resolveRunConfig: defaults when no config file exists', () => {
  const cwd = tempDir();

  assert.deepEqual(resolveRunConfig(parseArgs([]), {}, cwd), EventsConfigSchema.parse({}));
});

test('resolveRunConfig: picks up multicast.yaml from the working directory', () => {
  const cwd = tempDir({ 'multicast.yaml': 'error_policy: report\nbench:\n  runs: 3\n' });

  const config = resolveRunConfig(parseArgs([]), {}, cwd);

  assert.equal(config.error_policy, 'report');
  assert.deepEqual(config.bench, { sizes: [10, 100, 1000], runs: 3 });
});

test('resolveRunConfig: environment variables beat the config file', () => {
  const cwd = tempDir({ 'bench.yaml': 'error_policy: report\nlog_level: warn\n' });

  const config = resolveRunConfig(parseArgs(['bench.yaml']), { MULTICAST_ERROR_POLICY: 'throw' }, cwd);

  assert.equal(config.error_policy, 'throw');
  assert.equal(config.log_level, 'warn');
});

test('resolveRunConfig: flags beat environment variables', () => {
  const cwd = tempDir({ 'multicast.yaml': 'bench:\n  sizes: [7]\n  runs: 9\n' });

  const config = resolveRunConfig(
    parseArgs(['--log-level', 'error', '--sizes', '2,4', '--runs', '1']),
    { MULTICAST_LOG_LEVEL: 'info' },
    cwd
  );

  assert.equal(config.log_level, 'error');
  assert.deepEqual(config.bench, { sizes: [2, 4], runs: 1 });
});

test('resolveRunConfig: --trace turns tracing on and lowers the level to debug', () => {
  const cwd = tempDir();

  const config = resolveRunConfig(parseArgs(['--trace']), {}, cwd);

  assert.equal(config.trace, true);
  assert.equal(config.log_level, 'debug');
});

test('resolveRunConfig: --trace keeps an explicitly chosen level', () => {
  const cwd = tempDir();

  assert.equal(resolveRunConfig(parseArgs(['--trace']), { MULTICAST_LOG_LEVEL: 'warn' }, cwd).log_level, 'warn');
  assert.equal(resolveRunConfig(parseArgs(['--trace', '--log-level', 'info']), {}, cwd).log_level, 'info');
});

test('parsePositiveIntList: requires at least one value', () => {
  assert.deepEqual(parsePositiveIntList('1,,2'), [1, 2]);
  assert.throws(() => parsePositiveIntList(' , '), /Expected at least one value/);
});

test('parseFlag: accepts the usual truthy spellings', () => {
  for (const v of ['1', 'true', 'YES', ' on ']) assert.equal(parseFlag(v), true);
  for (const v of [undefined, '', '0', 'off', 'no']) assert.equal(parseFlag(v), false);
});
