import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import unzipper from 'unzipper';
import type { File as ArchiveEntry } from 'unzipper';
import { z } from 'zod';

import { ConfigError, withStage } from '../errors/index.js';
import { prefValueSchema } from '../schema/config.js';
import type { Prefs } from '../schema/config.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

const STAGE = 'create profile failed: ';
const PROFILE_PREFIX = 'wiredriver-';
const PREFS_FILE = 'user.js';

// ── Preference file ──────────────────────────────────────────

function renderPrefValue(key: string, value: unknown): string {
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (Number.isSafeInteger(value)) return String(value);
      break;
    case 'string':
      return JSON.stringify(value);
  }
  throw new ConfigError(`unexpected preference type: ${key}`);
}

/**
 * One `user_pref("key", value);` line per entry. Only booleans, integers
 * and strings are representable; anything else names the offending key.
 */
export function renderPrefs(prefs: Readonly<Record<string, unknown>>): string {
  return Object.entries(prefs)
    .map(([key, value]) => `user_pref(${JSON.stringify(key)}, ${renderPrefValue(key, value)});\n`)
    .join('');
}

const USER_PREF_LINE = /^\s*user_pref\(\s*("(?:[^"\\]|\\.)*")\s*,\s*(.+?)\s*\);\s*$/;

/** Reads `user_pref` statements back; other lines are ignored. */
export function parsePrefs(text: string): Prefs {
  const prefs: Prefs = {};
  for (const line of text.split('\n')) {
    const match = USER_PREF_LINE.exec(line);
    if (!match?.[1] || !match[2]) continue;

    const key = z.string().parse(JSON.parse(match[1]));
    const parsed = prefValueSchema.safeParse(JSON.parse(match[2]));
    if (!parsed.success) {
      throw new ConfigError(`unexpected preference type: ${key}`);
    }
    prefs[key] = parsed.data;
  }
  return prefs;
}

// ── Extension id ─────────────────────────────────────────────

const RDF_DESCRIPTION_OPEN = /<(?:[\w-]+:)?Description\b([^>]*)>/;
const RDF_ID_ATTRIBUTE = /\b(?:[\w-]+:)?id\s*=\s*"([^"]+)"/;
const RDF_ID_ELEMENT = /<(?:[\w-]+:)?id>\s*([^<\s]+)\s*<\/(?:[\w-]+:)?id>/;
// Target applications and dependencies carry ids of their own.
const RDF_NESTED_BLOCK =
  /<((?:[\w-]+:)?(?:targetApplication|requires|dependency))\b[^>]*?(?:\/>|>[\s\S]*?<\/\1\s*>)/g;

/** Id of the add-on described by an `install.rdf` manifest. */
export function extensionIdFromRdf(rdf: string): string | undefined {
  const description = RDF_DESCRIPTION_OPEN.exec(rdf);
  if (!description) return undefined;

  const fromAttribute = RDF_ID_ATTRIBUTE.exec(description[1] ?? '');
  if (fromAttribute?.[1]) return fromAttribute[1];

  const body = rdf
    .slice(description.index + description[0].length)
    .replace(RDF_NESTED_BLOCK, '');
  return RDF_ID_ELEMENT.exec(body)?.[1];
}

const geckoSettingsSchema = z.object({
  gecko: z.object({ id: z.string().min(1).optional() }).optional(),
});

const webExtensionManifestSchema = z.object({
  browser_specific_settings: geckoSettingsSchema.optional(),
  applications: geckoSettingsSchema.optional(),
});

/** Id of the add-on described by a WebExtension `manifest.json`. */
export function extensionIdFromManifest(json: string): string | undefined {
  const parsed = webExtensionManifestSchema.safeParse(JSON.parse(json));
  if (!parsed.success) return undefined;
  return (
    parsed.data.browser_specific_settings?.gecko?.id ??
    parsed.data.applications?.gecko?.id
  );
}

async function readExtensionId(entries: readonly ArchiveEntry[]): Promise<string> {
  const rdf = entries.find((entry) => entry.path === 'install.rdf');
  if (rdf) {
    const id = extensionIdFromRdf((await rdf.buffer()).toString('utf-8'));
    if (id) return id;
    throw new ConfigError('unable to find extension id in install.rdf');
  }

  const manifest = entries.find((entry) => entry.path === 'manifest.json');
  if (manifest) {
    const id = extensionIdFromManifest((await manifest.buffer()).toString('utf-8'));
    if (id) return id;
  }
  throw new ConfigError('unable to find extension id (no install.rdf or gecko id in manifest.json)');
}

// ── Extraction ───────────────────────────────────────────────

/** Absolute target of an archive entry; refuses paths that leave `root`. */
export function resolveEntryPath(root: string, entryPath: string): string {
  const target = path.resolve(root, entryPath);
  if (target !== root && !target.startsWith(root + path.sep)) {
    throw new ConfigError(`archive entry escapes extension directory: ${entryPath}`);
  }
  return target;
}

async function extractEntries(
  entries: readonly ArchiveEntry[],
  extensionDir: string,
): Promise<void> {
  await mkdir(extensionDir, { recursive: true, mode: 0o770 });

  for (const entry of entries) {
    const target = resolveEntryPath(extensionDir, entry.path);
    if (entry.type === 'Directory') {
      await mkdir(target, { recursive: true, mode: 0o770 });
      continue;
    }
    await mkdir(path.dirname(target), { recursive: true, mode: 0o770 });
    await writeFile(target, await entry.buffer(), { mode: 0o600 });
  }
}

// ── Profile ──────────────────────────────────────────────────

/**
 * Build a disposable browser profile: the extension archive exploded under
 * `extensions/<id>/` and the preferences in `user.js`. Returns the profile
 * directory. On failure nothing is left behind.
 */
export async function createTempProfile(
  archivePath: string,
  prefs: Readonly<Record<string, unknown>>,
  logger: Logger = silentLogger,
): Promise<string> {
  let profileDir: string | undefined;
  try {
    // Fail on bad preferences before touching the disk.
    const userJs = renderPrefs(prefs);

    profileDir = await mkdtemp(path.join(os.tmpdir(), PROFILE_PREFIX));
    const directory = await unzipper.Open.file(archivePath);
    const extensionId = await readExtensionId(directory.files);
    const extensionDir = path.join(profileDir, 'extensions', extensionId);

    await extractEntries(directory.files, extensionDir);
    await writeFile(path.join(profileDir, PREFS_FILE), userJs, { mode: 0o600 });

    logger.debug('profile created', { profileDir, extensionId });
    return profileDir;
  } catch (err) {
    if (profileDir !== undefined) {
      await rm(profileDir, { recursive: true, force: true });
    }
    throw withStage(STAGE, err, ConfigError);
  }
}
