/**
 * @arch depsum.test.unit
 * @intent:cli-output
 *
 * Tests for the sync command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, writeFile, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

vi.mock('chalk', () => ({
  default: {
    cyan: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
    gray: (s: string) => s,
    blue: (s: string) => s,
  },
}));

import { createSyncCommand, formatUpdate } from '../../../../src/cli/commands/sync.js';
import { logger } from '../../../../src/utils/logger.js';

const GO_SUM = 'example.com/foo v1.2.0 h1:abc=\nexample.com/foo v1.2.0/go.mod h1:foomod=\n';

const DEPS_BZL = `def go_dependencies():
    go_repository(
        name = "com_example_foo",
        importpath = "example.com/foo",
        sum = "h1:old=",
        version = "v1.2.0",
    )
    go_repository(
        name = "com_example_bar",
        importpath = "example.com/bar",
        sum = "h1:bar=",
        version = "v2.0.0",
    )
`;

const UPDATED_DEPS_BZL = DEPS_BZL.replace('h1:old=', 'h1:abc=');

describe('sync command', () => {
  let tempDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let processExitSpy: MockInstance<typeof process.exit>;

  async function run(...args: string[]): Promise<void> {
    await expect(createSyncCommand().parseAsync(['node', 'sync', ...args])).rejects.toThrow(
      'process.exit called'
    );
  }

  function loggedLines(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'depsum-cli-test-'));
    await writeFile(join(tempDir, 'go.sum'), GO_SUM);
    await writeFile(join(tempDir, 'deps.bzl'), DEPS_BZL);

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    logger.setLevel('info');
    logger.setOutput('stdout');
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('createSyncCommand', () => {
    it('should create a command named sync', () => {
      expect(createSyncCommand().name()).toBe('sync');
    });

    it('should expose its options', () => {
      const optionNames = createSyncCommand().options.map((opt) => opt.long);

      expect(optionNames).toEqual([
        '--go-sum',
        '--deps-bzl',
        '--config',
        '--check',
        '--strict',
        '--json',
        '--quiet',
        '--verbose',
      ]);
    });
  });

  describe('formatUpdate', () => {
    const record = { name: 'foo', importpath: 'example.com/foo', sum: 'h1:old=', version: 'v1.2.0' };

    it('should describe an update', () => {
      expect(
        formatUpdate({ status: 'updated', record, key: 'example.com/foo@v1.2.0', newSum: 'h1:abc=' })
      ).toBe('Updating example.com/foo v1.2.0: h1:old= -> h1:abc=');
    });

    it('should describe an unchanged record the same way', () => {
      expect(
        formatUpdate({ status: 'unchanged', record, key: 'example.com/foo@v1.2.0', newSum: 'h1:old=' })
      ).toBe('Updating example.com/foo v1.2.0: h1:old= -> h1:old=');
    });

    it('should warn about a missing checksum', () => {
      expect(formatUpdate({ status: 'missing', record, key: 'example.com/foo@v1.2.0' })).toBe(
        'Warning: No checksum found for example.com/foo@v1.2.0'
      );
    });
  });

  describe('sync', () => {
    it('should rewrite deps.bzl and print one line per record', async () => {
      await run();

      expect(loggedLines()).toEqual([
        'Updating example.com/foo v1.2.0: h1:old= -> h1:abc=',
        'Warning: No checksum found for example.com/bar@v2.0.0',
        'deps.bzl updated successfully',
      ]);
      expect(processExitSpy).toHaveBeenCalledWith(0);
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(UPDATED_DEPS_BZL);
    });

    it('should accept explicit file paths', async () => {
      await writeFile(join(tempDir, 'other.sum'), 'example.com/bar v2.0.0 h1:newbar=\n');

      await run('--go-sum', 'other.sum', '--deps-bzl', join(tempDir, 'deps.bzl'));

      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(
        DEPS_BZL.replace('h1:bar=', 'h1:newbar=')
      );
      expect(processExitSpy).toHaveBeenCalledWith(0);
    });

    it('should read file paths from the config file', async () => {
      await writeFile(join(tempDir, '.depsum.yaml'), 'deps_bzl: bazel.bzl\n');
      await writeFile(join(tempDir, 'bazel.bzl'), DEPS_BZL);

      await run();

      expect(await readFile(join(tempDir, 'bazel.bzl'), 'utf-8')).toBe(UPDATED_DEPS_BZL);
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(DEPS_BZL);
      expect(loggedLines()).toContain('bazel.bzl updated successfully');
    });

    it('should print nothing with --quiet', async () => {
      await run('--quiet');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(processExitSpy).toHaveBeenCalledWith(0);
    });

    it('should print the summary as JSON with --json', async () => {
      await run('--json');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toMatchObject({
        goSumPath: join(tempDir, 'go.sum'),
        depsBzlPath: join(tempDir, 'deps.bzl'),
        manifestEntries: 1,
        updated: 1,
        unchanged: 0,
        missing: 1,
        written: true,
      });
      expect(output.updates).toHaveLength(2);
    });

    it('should keep stdout valid JSON with --json --verbose', async () => {
      await run('--json', '--verbose');

      const output = JSON.parse(loggedLines().join('\n'));
      expect(output.updated).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        `[DEBUG] [go.sum] Loaded 1 checksums from ${join(tempDir, 'go.sum')}`
      );
      expect(processExitSpy).toHaveBeenCalledWith(0);
    });

    it('should print debug lines to stdout with --verbose alone', async () => {
      await run('--verbose');

      expect(loggedLines()[0]).toBe(`[DEBUG] [go.sum] Loaded 1 checksums from ${join(tempDir, 'go.sum')}`);
      expect(loggedLines().at(-1)).toBe('deps.bzl updated successfully');
    });

    it('should exit 1 and log the error when go.sum is missing', async () => {
      await rm(join(tempDir, 'go.sum'));

      await run();

      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(1, '[ERROR] Failed to sync checksums');
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(DEPS_BZL);
    });

    it('should exit 1 when the config file is invalid', async () => {
      await writeFile(join(tempDir, '.depsum.yaml'), 'fail_on_missing: sometimes\n');

      await run();

      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(DEPS_BZL);
    });
  });

  describe('--check', () => {
    it('should exit 1 without writing when checksums are stale', async () => {
      await run('--check');

      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(loggedLines().at(-1)).toBe('deps.bzl is stale: 1 checksum(s) differ from go.sum');
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(DEPS_BZL);
    });

    it('should exit 0 when checksums are current', async () => {
      await writeFile(join(tempDir, 'deps.bzl'), UPDATED_DEPS_BZL);

      await run('--check');

      expect(processExitSpy).toHaveBeenCalledWith(0);
      expect(loggedLines().at(-1)).toBe('deps.bzl is up to date');
    });
  });

  describe('missing checksums', () => {
    it('should not fail by default', async () => {
      await run();

      expect(processExitSpy).toHaveBeenCalledWith(0);
    });

    it('should exit 1 with --strict', async () => {
      await run('--strict');

      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '[ERROR] 1 go_repository record(s) have no checksum in go.sum'
      );
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(UPDATED_DEPS_BZL);
    });

    it('should combine --check and --strict without writing', async () => {
      await writeFile(join(tempDir, 'deps.bzl'), UPDATED_DEPS_BZL);

      await run('--check', '--strict');

      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(loggedLines().at(-1)).toBe('deps.bzl is up to date');
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '[ERROR] 1 go_repository record(s) have no checksum in go.sum'
      );
      expect(await readFile(join(tempDir, 'deps.bzl'), 'utf-8')).toBe(UPDATED_DEPS_BZL);
    });

    it('should still report missing checksums with --quiet --strict', async () => {
      await run('--quiet', '--strict');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '[ERROR] 1 go_repository record(s) have no checksum in go.sum'
      );
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should exit 1 when fail_on_missing is configured', async () => {
      await writeFile(join(tempDir, '.depsum.yaml'), 'fail_on_missing: true\n');

      await run();

      expect(processExitSpy).toHaveBeenCalledWith(1);
    });
  });
});
