import fs from 'fs';
import os from 'os';
import path from 'path';
import { initializeLogging } from '../../src/runtime/logging';
import { ConfigurationError } from '../../src/shared/errors';

describe('initializeLogging', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'optimade-client-log-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('without a log file nothing is patched', async () => {
    const before = console.log;
    const handle = initializeLogging();

    expect(handle.logPath).toBeUndefined();
    expect(console.log).toBe(before);
    await handle.shutdown();
  });

  test('mirrors console output into the file and restores the console', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logFile = path.join(dir, 'nested', 'chat.log');

    const handle = initializeLogging(logFile);
    console.log('hello', { tools: 3 });
    console.error('bad thing');
    await handle.shutdown();

    expect(handle.logPath).toBe(path.resolve(logFile));
    expect(logSpy).toHaveBeenCalledWith('hello', { tools: 3 });
    expect(errorSpy).toHaveBeenCalledWith('bad thing');
    expect(console.log).toBe(logSpy);

    const lines = fs.readFileSync(logFile, 'utf8').trimEnd().split('\n');
    const withoutTimestamps = lines.map((line) => line.replace(/^\[[^\]]+\] /, ''));
    expect(withoutTimestamps).toEqual([
      '--- chat session started ---',
      'LOG hello {"tools":3}',
      'ERROR bad thing',
      '--- chat session ended ---',
    ]);
  });

  test('appends to an existing file and tolerates a second shutdown', async () => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logFile = path.join(dir, 'chat.log');
    fs.writeFileSync(logFile, 'previous run\n');

    const handle = initializeLogging(logFile);
    console.info('again');
    await handle.shutdown();
    await handle.shutdown();

    const content = fs.readFileSync(logFile, 'utf8');
    expect(content.startsWith('previous run\n')).toBe(true);
    expect(content.match(/chat session ended/g)).toHaveLength(1);
    expect(content).toContain('INFO again\n');
  });

  test('an unwritable log path fails fast and leaves the console alone', () => {
    const before = console.log;

    expect(() => initializeLogging(dir)).toThrow(ConfigurationError);
    expect(() => initializeLogging(dir)).toThrow(`Cannot write log file ${path.resolve(dir)}: EISDIR`);
    expect(console.log).toBe(before);
  });
});
