import fs from 'node:fs/promises';
import path from 'node:path';
import type { IConfig, IConfigStore } from '../../types/index.js';
import { configDir } from '../../utils/paths.js';

export const DEFAULT_CONFIG: IConfig = {
  exclude: [],
  dryRun: false,
  verbose: false
};

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function validateConfig(input: unknown): IConfig {
  const raw = isRecord(input) ? input : {};
  const cfg: IConfig = { ...DEFAULT_CONFIG, exclude: [...DEFAULT_CONFIG.exclude] };
  if (isStringArray(raw.exclude)) {
    cfg.exclude = Array.from(new Set(raw.exclude.map((g) => g.trim()).filter((g) => g.length > 0)));
  }
  if (typeof raw.dryRun === 'boolean') cfg.dryRun = raw.dryRun;
  if (typeof raw.verbose === 'boolean') cfg.verbose = raw.verbose;
  return cfg;
}

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class ConfigStore implements IConfigStore {
  private current: IConfig | null = null;

  constructor(private readonly dir: string = configDir()) {}

  get file(): string {
    return path.join(this.dir, 'config.json');
  }

  async get(): Promise<IConfig> {
    if (this.current) return this.current;
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (!isMissing(err)) throw err;
      this.current = validateConfig(DEFAULT_CONFIG);
      await this.persist(this.current);
      return this.current;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // invalid JSON: run on defaults and keep the file for manual fix
      parsed = {};
    }
    this.current = validateConfig(parsed);
    return this.current;
  }

  private async persist(cfg: IConfig): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
      const tmp = this.file + '.tmp';
      await fs.writeFile(tmp, JSON.stringify(cfg, null, 2), { encoding: 'utf8', mode: 0o600 });
      await fs.rename(tmp, this.file);
    } catch (err) {
      // read-only/sandboxed home: run on defaults without writing them
      if (!isPermissionError(err)) throw err;
    }
  }
}

function isPermissionError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EROFS';
}
