import os from 'node:os';
import path from 'node:path';

const APP_NAME = 'snipren';
const isMac = process.platform === 'darwin';
const homeDir = os.homedir();

/** Directory holding config.json: $SNIPREN_HOME, then XDG, then the platform default. */
export function configDir(): string {
	const override = process.env.SNIPREN_HOME;
	if (override && override.length > 0) return override;
	const xdg = process.env.XDG_CONFIG_HOME;
	if (xdg && xdg.length > 0) return path.join(xdg, APP_NAME);
	if (isMac) return path.join(homeDir, 'Library', 'Application Support', APP_NAME);
	return path.join(homeDir, '.config', APP_NAME);
}

export function logsDir(): string {
	const override = process.env.SNIPREN_LOGS;
	if (override && override.length > 0) return override;
	const xdgState = process.env.XDG_STATE_HOME;
	if (xdgState && xdgState.length > 0) return path.join(xdgState, APP_NAME, 'logs');
	if (isMac) return path.join(homeDir, 'Library', 'Logs', APP_NAME);
	return path.join(homeDir, '.local', 'state', APP_NAME, 'logs');
}
