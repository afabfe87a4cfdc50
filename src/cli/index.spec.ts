import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { run } from './index.js';
import { explanation } from './explain.js';

let tempRoot: string;
let workDir: string;
let stdout: string[];
let stderr: string[];

beforeEach(async () => {
  tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'snipren-cli-'));
  process.env.SNIPREN_HOME = path.join(tempRoot, 'config');
  process.env.SNIPREN_LOGS = path.join(tempRoot, 'logs');
  workDir = path.join(tempRoot, 'work');
  await fs.mkdir(workDir);
  stdout = [];
  stderr = [];
});

afterEach(async () => {
  delete process.env.SNIPREN_HOME;
  delete process.env.SNIPREN_LOGS;
  await fs.rm(tempRoot, { recursive: true, force: true });
});

function cli(...argv: string[]) {
  return run(argv, {
    cwd: workDir,
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text)
  });
}

async function touch(...names: string[]) {
  for (const name of names) await fs.writeFile(path.join(workDir, name), '');
}

describe('rn', () => {
  it('prints the rename and exits 0', async () => {
    await touch('route_report.csv');
    expect(await cli('route_report_before.csv')).toBe(0);
    expect(stdout.join('')).toBe('route_report.csv → route_report_before.csv\n');
    expect(stderr).toEqual([]);
    expect(await fs.readdir(workDir)).toEqual(['route_report_before.csv']);
  });

  it('prints refusals to stderr and exits 1', async () => {
    await touch('config.yml', 'config.json');
    expect(await cli('config.yaml')).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr.join('')).toBe(
      "Multiple candidates found for 'config.yaml':\n  config.json\n  config.yml\n\nCannot proceed - ambiguous match.\n"
    );
  });

  it('requires --force to overwrite an existing target', async () => {
    await touch('notes.txt', 'notes_v2.txt');
    expect(await cli('notes_v2.txt')).toBe(1);
    expect(stderr.join('')).toBe("Target 'notes_v2.txt' already exists. Use --force to overwrite.\n");

    stderr = [];
    expect(await cli('notes_v2.txt', '--force')).toBe(0);
    expect(stdout.join('')).toBe('notes.txt → notes_v2.txt\n');
  });

  it('previews with --dry-run', async () => {
    await touch('README');
    expect(await cli('-n', 'README.md')).toBe(0);
    expect(stdout.join('')).toBe('README → README.md (dry run)\n');
    expect(await fs.readdir(workDir)).toEqual(['README']);
  });

  it('performs the rename with --no-dry-run when the config enables dry run', async () => {
    await touch('README');
    const configHome = path.join(tempRoot, 'config');
    await fs.mkdir(configHome, { recursive: true });
    await fs.writeFile(path.join(configHome, 'config.json'), JSON.stringify({ dryRun: true }));

    expect(await cli('README.md')).toBe(0);
    expect(stdout.join('')).toBe('README → README.md (dry run)\n');
    expect(await fs.readdir(workDir)).toEqual(['README']);

    stdout = [];
    expect(await cli('--no-dry-run', 'README.md')).toBe(0);
    expect(stdout.join('')).toBe('README → README.md\n');
    expect(await fs.readdir(workDir)).toEqual(['README.md']);
  });

  it('echoes log records to the provided stderr with --verbose', async () => {
    await touch('data.json');
    expect(await cli('--verbose', 'data.yaml')).toBe(0);
    expect(stdout.join('')).toBe('data.json → data.yaml\n');
    expect(stderr.some((line) => /^\[.+\] INFO data\.json → data\.yaml\n$/.test(line))).toBe(true);
  });

  it('applies exclude patterns from the config file', async () => {
    await touch('app.log', 'app.lock');
    const configHome = path.join(tempRoot, 'config');
    await fs.mkdir(configHome, { recursive: true });
    await fs.writeFile(path.join(configHome, 'config.json'), JSON.stringify({ exclude: ['*.lock'] }));

    expect(await cli('app.txt')).toBe(0);
    expect(stdout.join('')).toBe('app.log → app.txt\n');
  });

  it('writes the default config and a session log', async () => {
    await touch('data.json');
    expect(await cli('data.yaml')).toBe(0);

    const cfg = JSON.parse(await fs.readFile(path.join(tempRoot, 'config', 'config.json'), 'utf8'));
    expect(cfg).toEqual({ exclude: [], dryRun: false, verbose: false });

    const log = await fs.readFile(path.join(tempRoot, 'logs', 'session.log'), 'utf8');
    const records = log.trim().split('\n').map((l) => JSON.parse(l));
    expect(records.some((r) => r.level === 'info' && r.msg === 'data.json → data.yaml')).toBe(true);
  });

  it('prints the explanation', async () => {
    expect(await cli('--explain')).toBe(0);
    expect(stdout.join('')).toBe(explanation);
  });

  it('prints the package version', async () => {
    expect(await cli('--version')).toBe(0);
    expect(stdout.join('')).toBe('0.1.0\n');
  });

  it('fails without a target name', async () => {
    expect(await cli()).toBe(1);
    expect(stderr.join('')).toBe("error: missing required argument 'new-name'\n");
  });

  it('rejects unknown options', async () => {
    expect(await cli('--bogus', 'a.txt')).toBe(1);
    expect(stderr.join('')).toMatch(/unknown option '--bogus'/);
  });
});
