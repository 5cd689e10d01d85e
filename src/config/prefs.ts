import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { prefsSchema } from '../schema/config.js';
import type { Prefs } from '../schema/config.js';

// ── Default table ────────────────────────────────────────────

const DEFAULT_PREFS_URL = new URL('../../data/default-prefs.json', import.meta.url);

/**
 * Browser defaults for a disposable automation profile: caches, updates,
 * telemetry and security prompts off; webdriver extension settings on.
 */
export async function loadDefaultPrefs(): Promise<Prefs> {
  const raw = await readFile(DEFAULT_PREFS_URL, 'utf-8');
  return prefsSchema.parse(JSON.parse(raw));
}

// ── Log directory ────────────────────────────────────────────

/** Routes the extension's log files into `dir`. */
export function logDirPrefs(dir: string): Prefs {
  return {
    'webdriver.log.file': path.join(dir, 'jsconsole.log'),
    'webdriver.log.driver.file': path.join(dir, 'driver.log'),
    'webdriver.log.profiler.file': path.join(dir, 'profiler.log'),
    'webdriver.log.browser.file': path.join(dir, 'browser.log'),
  };
}

/** Preference key telling the extension which port to serve on. */
export const PORT_PREF = 'webdriver_firefox_port';
