/**
 * @arch depsum.cli.command
 * @intent:cli-output
 *
 * sync command - Copy go.sum checksums into deps.bzl.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { syncChecksums, type SyncSummary } from '../../core/sync.js';
import type { RecordUpdate } from '../../core/deps-bzl/types.js';
import { resolvePath, basename } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

interface SyncCommandOptions {
  goSum?: string;
  depsBzl?: string;
  config?: string;
  check?: boolean;
  strict?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Report line for one go_repository record.
 */
export function formatUpdate(update: RecordUpdate): string {
  const { importpath, version, sum } = update.record;
  if (update.status === 'missing') {
    return `Warning: No checksum found for ${update.key}`;
  }
  return `Updating ${importpath} ${version}: ${sum} -> ${update.newSum}`;
}

function printReport(summary: SyncSummary, check: boolean): void {
  for (const update of summary.updates) {
    const line = formatUpdate(update);
    if (update.status === 'missing') {
      console.log(chalk.yellow(line));
    } else if (update.status === 'updated') {
      console.log(chalk.cyan(line));
    } else {
      console.log(chalk.gray(line));
    }
  }

  const file = basename(summary.depsBzlPath);
  if (!check) {
    console.log(chalk.green(`${file} updated successfully`));
  } else if (summary.updated > 0) {
    console.log(chalk.yellow(`${file} is stale: ${summary.updated} checksum(s) differ from go.sum`));
  } else {
    console.log(chalk.green(`${file} is up to date`));
  }
}

/**
 * Create the sync command.
 */
export function createSyncCommand(): Command {
  return new Command('sync')
    .description('Copy go.sum checksums into deps.bzl go_repository records')
    .option('--go-sum <path>', 'Checksum manifest (default: go.sum)')
    .option('--deps-bzl <path>', 'Bazel dependency file to rewrite (default: deps.bzl)')
    .option('-c, --config <path>', 'Config file (default: .depsum.yaml)')
    .option('--check', 'Only check for stale checksums (exit 1 if stale)')
    .option('--strict', 'Exit 1 if any record has no checksum in go.sum')
    .option('--json', 'Output result as JSON')
    .option('--quiet', 'Suppress per-record output')
    .option('--verbose', 'Enable debug logging')
    .action(async (options: SyncCommandOptions) => {
      let exitCode = 0;
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        logger.setLevel(options.verbose ? 'debug' : config.log_level);
        // stdout carries only the summary in JSON mode
        logger.setOutput(options.json ? 'stderr' : 'stdout');

        const check = options.check ?? false;
        const summary = await syncChecksums({
          goSumPath: resolvePath(projectRoot, options.goSum ?? config.go_sum),
          depsBzlPath: resolvePath(projectRoot, options.depsBzl ?? config.deps_bzl),
          dryRun: check,
        });

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else if (!options.quiet) {
          printReport(summary, check);
        }

        if (check && summary.updated > 0) {
          exitCode = 1;
        }
        if ((options.strict || config.fail_on_missing) && summary.missing > 0) {
          if (!options.json) {
            logger.error(`${summary.missing} go_repository record(s) have no checksum in go.sum`);
          }
          exitCode = 1;
        }
      } catch (error) {
        logger.error('Failed to sync checksums', error instanceof Error ? error : undefined);
        exitCode = 1;
      }
      process.exit(exitCode);
    });
}
