import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import type { ILogger } from '../../types/index.js';
import { logsDir } from '../../utils/paths.js';

type Level = 'info' | 'warn' | 'error' | 'debug';

export type LoggerOptions = {
	/** Mirror records in human-readable form to `sink` */
	echo?: boolean;
	/** Where echoed lines go; stderr by default */
	sink?: (text: string) => void;
	/** Override the directory session.log is written to */
	dir?: string;
};

/**
 * JSON-lines session logger. Records go to `session.log` once `open()` has run and to an
 * in-memory ring always. stdout is never written: it carries the command's result.
 */
export class Logger implements ILogger {
	private stream: fs.WriteStream | null = null;
	private ring: string[] = [];
	private max = 500;
	private logFile: string | null = null;
	private readonly echo: boolean;
	private readonly sink: (text: string) => void;
	private readonly dir: string | undefined;

	constructor(opts: LoggerOptions = {}) {
		this.echo = opts.echo ?? false;
		this.sink = opts.sink ?? ((text) => process.stderr.write(text));
		this.dir = opts.dir;
	}

	async open(): Promise<void> {
		if (this.stream) return;
		const dir = this.dir ?? logsDir();
		try {
			await fsp.mkdir(dir, { recursive: true });
		} catch (err) {
			// read-only home: keep the ring only
			this.pushRing(JSON.stringify({ ts: new Date().toISOString(), level: 'warn', msg: 'log file disabled', meta: { dir, error: String(err) } }));
			return;
		}
		this.logFile = path.join(dir, 'session.log');
		const stream = fs.createWriteStream(this.logFile, { flags: 'a', encoding: 'utf8' });
		stream.on('error', (err) => {
			if (this.stream === stream) this.stream = null;
			this.pushRing(JSON.stringify({ ts: new Date().toISOString(), level: 'warn', msg: 'log file disabled', meta: { error: err.message } }));
		});
		this.stream = stream;
	}

	async close(): Promise<void> {
		const stream = this.stream;
		if (!stream) return;
		this.stream = null;
		await new Promise<void>((resolve, reject) => {
			stream.once('error', reject);
			stream.end(() => resolve());
		});
	}

	getLogFile(): string | null {
		return this.logFile;
	}

	private pushRing(line: string) {
		this.ring.push(line);
		if (this.ring.length > this.max) this.ring.shift();
	}

	private write(level: Level, msg: string, meta?: Record<string, unknown>) {
		const ts = new Date().toISOString();
		const rec = { ts, level, msg, ...(meta ? { meta } : {}) };
		const line = JSON.stringify(rec);
		this.pushRing(line);
		if (this.stream) this.stream.write(`${line}\n`);
		if (this.echo) this.sink(`[${ts}] ${level.toUpperCase()} ${msg}\n`);
	}

	info(msg: string, meta?: Record<string, unknown>): void {
		this.write('info', msg, meta);
	}
	warn(msg: string, meta?: Record<string, unknown>): void {
		this.write('warn', msg, meta);
	}
	error(msg: string | Error, meta?: Record<string, unknown>): void {
		if (msg instanceof Error) this.write('error', msg.message, { stack: msg.stack, ...meta });
		else this.write('error', msg, meta);
	}
	debug(msg: string, meta?: Record<string, unknown>): void {
		this.write('debug', msg, meta);
	}

	getRing(): string[] {
		return [...this.ring];
	}
}
