/**
 * CLI Args Tests
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, toConfigOverrides } from '../../../src/cli/args.js';

describe('parseArgs', () => {
  it('should return empty args for no input', () => {
    expect(parseArgs([])).toEqual({});
  });

  describe('--headless', () => {
    const cases: [string[], boolean][] = [
      [['--headless'], true],
      [['--headless=true'], true],
      [['--headless=1'], true],
      [['--headless=false'], false],
      [['--headless=0'], false],
    ];

    it.each(cases)('parses %j as %s', (argv, expected) => {
      expect(parseArgs(argv).headless).toBe(expected);
    });
  });

  it('should read flags that take a value', () => {
    const args = parseArgs([
      '--config',
      './env.json',
      '--startUrl',
      'http://localhost:7770',
      '--userDataDir',
      './profile',
      '--channel',
      'chrome',
      '--executablePath',
      '/usr/bin/chromium',
      '--proxy',
      'http://127.0.0.1:8080',
    ]);

    expect(args).toEqual({
      config: './env.json',
      startUrl: 'http://localhost:7770',
      userDataDir: './profile',
      channel: 'chrome',
      executablePath: '/usr/bin/chromium',
      proxy: 'http://127.0.0.1:8080',
    });
  });

  it('should ignore a value flag without a value', () => {
    expect(parseArgs(['--startUrl'])).toEqual({});
  });

  it('should warn about unknown arguments', () => {
    const args = parseArgs(['--hedless']);

    expect(args).toEqual({});
    expect(console.warn).toHaveBeenCalledWith('Warning: Unknown argument "--hedless" - ignored');
  });

  it('should skip bare positional values', () => {
    expect(parseArgs(['stray', '--headless'])).toEqual({ headless: true });
  });
});

describe('toConfigOverrides', () => {
  it('should map only the given values', () => {
    expect(toConfigOverrides({ headless: false, startUrl: 'http://localhost:7770' })).toEqual({
      headless: false,
      startUrl: 'http://localhost:7770',
    });
  });

  it('should enable the proxy when a server is given', () => {
    expect(toConfigOverrides({ proxy: 'http://127.0.0.1:8080' })).toEqual({
      proxy: { enabled: true, server: 'http://127.0.0.1:8080' },
    });
  });

  it('should not carry the config path', () => {
    expect(toConfigOverrides({ config: './env.json' })).toEqual({});
  });
});
