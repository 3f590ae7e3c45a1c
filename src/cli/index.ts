/**
 * @arch depsum.cli.barrel
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createSyncCommand } from './commands/sync.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const { version: VERSION } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')));

/** Create the CLI program. Without a subcommand it runs `sync`. */
export function createCli(): Command {
  return new Command()
    .name('depsum')
    .description('Synchronize go.sum checksums into Bazel deps.bzl')
    .version(VERSION)
    .addCommand(createSyncCommand(), { isDefault: true });
}
