import { Command, CommanderError } from 'commander';
import { createRequire } from 'node:module';
import type { IConfig, IConfigStore } from '../types/index.js';
import type { ResolveResult } from '../types/resolve.js';
import { ConfigStore } from '../core/config/ConfigStore.js';
import { Logger } from '../core/log/Logger.js';
import { CandidateResolver } from '../core/resolve/CandidateResolver.js';
import { previewMessage, renamedMessage } from '../core/resolve/messages.js';
import { explanation } from './explain.js';

export type CliIO = {
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  configStore?: IConfigStore;
};

type CliOptions = {
  force?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  explain?: boolean;
  version?: boolean;
};

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Entry point for `rn <new-name>`. Returns the process exit code: 0 when a rename was applied
 * or previewed, 1 for any refusal or failure.
 */
export async function run(argv: string[] = process.argv.slice(2), io: CliIO = {}): Promise<number> {
  const out = io.stdout ?? ((text: string) => process.stdout.write(text));
  const err = io.stderr ?? ((text: string) => process.stderr.write(text));

  const program = new Command();
  program
    .name('rn')
    .description('A fast, safe, intent-aware rename utility')
    .argument('[new-name]', 'The new filename to rename to')
    .option('-f, --force', 'Force rename even if target exists')
    .option('-n, --dry-run', 'Show the rename without performing it')
    .option('--no-dry-run', 'Rename even when the config enables dry run')
    .option('--verbose', 'Echo log records to stderr')
    .option('--explain', 'Describe how the matching file is chosen')
    .option('-V, --version', 'Print version')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: out, writeErr: err });

  try {
    program.parse(argv, { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  const opts = program.opts<CliOptions>();

  if (opts.version) {
    out(`${readVersion()}\n`);
    return 0;
  }
  if (opts.explain) {
    out(explanation);
    return 0;
  }

  const [target] = program.args;
  if (target === undefined) {
    err("error: missing required argument 'new-name'\n");
    return 1;
  }

  let cfg: IConfig;
  try {
    cfg = await (io.configStore ?? new ConfigStore()).get();
  } catch (e) {
    err(`Failed to load config: ${e instanceof Error ? e.message : String(e)}\n`);
    return 1;
  }
  const logger = new Logger({ echo: opts.verbose ?? cfg.verbose, sink: err });
  await logger.open();
  try {
    const resolver = new CandidateResolver({ logger });
    const result = await resolver.resolve(target, {
      cwd: io.cwd ?? process.cwd(),
      force: opts.force ?? false,
      dryRun: opts.dryRun ?? cfg.dryRun,
      exclude: cfg.exclude
    });
    return report(result, out, err);
  } catch (e) {
    logger.error(e instanceof Error ? e : String(e));
    err(`${e instanceof Error ? e.message : String(e)}\n`);
    return 1;
  } finally {
    await logger.close();
  }
}

function report(result: ResolveResult, out: (text: string) => void, err: (text: string) => void): number {
  switch (result.kind) {
    case 'applied':
      out(`${renamedMessage(result.from, result.to)}\n`);
      return 0;
    case 'preview':
      out(`${previewMessage(result.from, result.to)}\n`);
      return 0;
    case 'refused':
      err(`${result.message}\n`);
      return 1;
  }
}
