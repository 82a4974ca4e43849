import path from 'path';
import type { IConfig } from 'config';

/** `config/` at the package root, next to `src/` and `dist/`. */
export const CONFIG_DIR = path.join(__dirname, '../../config');

let cachedConfig: IConfig | null = null;

/**
 * node-config reads NODE_CONFIG_DIR once, on first require. Point it at CONFIG_DIR for that
 * require only and put the caller's value back afterwards, even when loading fails.
 * NODE_ENV picks the overlay file (`test.json` under Jest); missing overlays fall back to default.json.
 */
export function loadModuleConfig(): IConfig {
  if (cachedConfig) return cachedConfig;
  const callerConfigDir = process.env.NODE_CONFIG_DIR;
  process.env.NODE_CONFIG_DIR = CONFIG_DIR;
  try {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    const loaded: IConfig = require('config');
    cachedConfig = loaded;
    return loaded;
  } finally {
    if (callerConfigDir === undefined) {
      delete process.env.NODE_CONFIG_DIR;
    } else {
      process.env.NODE_CONFIG_DIR = callerConfigDir;
    }
  }
}
