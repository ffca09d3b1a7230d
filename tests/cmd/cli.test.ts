import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { CommanderError } from 'commander';
import { buildProgram, parseCliOptions, runCli } from '../../cmd/cli';

const POST_URL = 'https://www.instagram.com/p/ABC123xyz/';

function quietProgram() {
  return buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
}

function parse(...args: string[]) {
  return parseCliOptions(['--post-url', POST_URL, ...args], 'user', quietProgram());
}

function commanderCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof CommanderError ? error.code : undefined;
  }
  return undefined;
}

describe('parseCliOptions', () => {
  test('should leave unset flags to the configuration', () => {
    expect(parse()).toEqual({
      postUrl: POST_URL,
      config: 'config.json',
      maxComments: undefined,
      resume: undefined,
      fetchReplies: undefined,
      debug: false,
    });
  });

  test('should read every flag', () => {
    expect(parse('--config', 'custom.json', '--max-comments', '25', '--resume', '--fetch-replies', '-d')).toEqual({
      postUrl: POST_URL,
      config: 'custom.json',
      maxComments: 25,
      resume: true,
      fetchReplies: true,
      debug: true,
    });
  });

  test('should turn replies and resume off', () => {
    const options = parse('--no-replies', '--no-resume');

    expect(options.fetchReplies).toBe(false);
    expect(options.resume).toBe(false);
  });

  test('should let the last resume flag win', () => {
    expect(parse('--resume', '--no-resume').resume).toBe(false);
    expect(parse('--no-resume', '--resume').resume).toBe(true);
  });

  test('should accept zero as no comment limit', () => {
    expect(parse('--max-comments', '0').maxComments).toBe(0);
  });

  test('should reject a non-numeric comment limit', () => {
    expect(commanderCode(() => parse('--max-comments', 'many'))).toBe('commander.invalidArgument');
  });

  test('should reject contradicting reply flags', () => {
    expect(commanderCode(() => parse('--fetch-replies', '--no-replies'))).toBe('commander.conflictingOption');
  });

  test('should require the post URL', () => {
    expect(commanderCode(() => parseCliOptions([], 'user', quietProgram()))).toBe(
      'commander.missingMandatoryOptionValue'
    );
  });
});

describe('runCli', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ig-cli-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('should exit with 1 on an unreadable config file', async () => {
    const configFile = path.join(tempDir, 'config.json');
    fs.writeFileSync(configFile, '{broken');

    await expect(runCli({ postUrl: POST_URL, config: configFile, debug: false })).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  test('should exit with 1 on a URL without a shortcode', async () => {
    const configFile = path.join(tempDir, 'config.json');
    fs.writeFileSync(configFile, JSON.stringify({ instagram: { settings: { data_dir: path.join(tempDir, 'data') } } }));

    await expect(
      runCli({ postUrl: 'https://www.instagram.com/someuser/', config: configFile, debug: false })
    ).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith('❌ Invalid Instagram post URL: https://www.instagram.com/someuser/');
  });
});
