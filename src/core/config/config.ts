/**
 * Configuration loading
 *
 * Built-in defaults (config/default-config.json) are deep-merged with an
 * optional user file, validated, resolved to absolute paths and frozen. The
 * resulting AppConfig is passed explicitly to every component.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import defaultConfig from '../../../config/default-config.json';
import {
  BACKUP_KINDS,
  type BackupKind,
  type RetentionPolicy,
} from '../../interfaces/backup';
import {
  STORAGE_PROVIDERS,
  type StorageProviderName,
} from '../../interfaces/storage';
import { ConfigError, errorMessage } from '../../utils/errors';
import { expandHome } from '../../utils/fs-utils';
import { DEFAULT_STATE_DIR } from '../../utils/state-dir';

export const CONFIG_PATH_ENV_VAR = 'DROPSHELF_CONFIG';
export const BASE_DIR_ENV_VAR = 'DROPSHELF_BASE';
export const ARCHIVE_SUBDIR = 'Archive';
export const STAGING_SUBDIR = '.staging';

const extensionKey = z
  .string()
  .regex(/^\.[^./\\\s]+$/, 'extensions must look like ".pdf"');

const nonEmpty = z.string().trim().min(1);

const rawConfigSchema = z
  .object({
    companyName: nonEmpty,
    baseDir: nonEmpty,
    dropZone: nonEmpty,
    stateDir: nonEmpty.optional(),
    folders: z.record(nonEmpty, nonEmpty),
    routing: z
      .object({
        extensions: z.record(extensionKey, nonEmpty),
        fallbackCategory: nonEmpty,
        fallbackFolder: nonEmpty,
        sniffContent: z.boolean(),
        ignoreNames: z.array(nonEmpty),
        concurrency: z.number().int().positive().optional(),
      })
      .strict(),
    backup: z
      .object({
        dir: nonEmpty,
        prefix: z
          .string()
          .regex(
            /^[A-Za-z0-9-]+(?:_[A-Za-z0-9-]+)*$/,
            'prefix may contain letters, digits, "-" and single "_"',
          ),
        sourceDir: nonEmpty.optional(),
        excludePatterns: z.array(nonEmpty),
      })
      .strict(),
    retention: z
      .object({
        maxWorking: z.number().int().min(1),
        maxArchive: z.number().int().min(0),
        minSizeBytes: z.number().int().min(0),
        runKind: z.enum(BACKUP_KINDS),
        graceHours: z.number().min(0),
        schedules: z.object({
          daily: nonEmpty.optional(),
          weekly: nonEmpty.optional(),
          monthly: nonEmpty.optional(),
        }),
      })
      .strict(),
    storage: z
      .object({
        provider: z.enum(STORAGE_PROVIDERS),
        timeoutMs: z.number().int().positive(),
        localMirror: z.object({ path: nonEmpty }).strict().optional(),
        objectStore: z
          .object({
            bucket: nonEmpty,
            prefix: z.string().optional(),
            command: nonEmpty.optional(),
          })
          .strict()
          .optional(),
        drive: z
          .object({
            remote: nonEmpty,
            folder: z.string().optional(),
            command: nonEmpty.optional(),
          })
          .strict()
          .optional(),
      })
      .strict(),
  })
  .strict();

type RawConfig = z.infer<typeof rawConfigSchema>;

export interface RoutingConfig {
  extensions: Readonly<Record<string, string>>;
  fallbackCategory: string;
  fallbackFolder: string;
  sniffContent: boolean;
  ignoreNames: readonly string[];
  concurrency?: number;
}

export interface BackupConfig {
  dir: string;
  archiveDir: string;
  stagingDir: string;
  prefix: string;
  sourceDir: string;
  excludePatterns: readonly string[];
}

export interface RetentionConfig extends RetentionPolicy {
  runKind: BackupKind;
  graceHours: number;
  schedules: Readonly<Partial<Record<BackupKind, string>>>;
}

export interface StorageConfig {
  provider: StorageProviderName;
  timeoutMs: number;
  localMirror?: { path: string };
  objectStore?: { bucket: string; prefix: string; command: string };
  drive?: { remote: string; folder: string; command: string };
}

export interface AppConfig {
  companyName: string;
  baseDir: string;
  dropZone: string;
  stateDir: string;
  /** category name → absolute folder */
  folders: Readonly<Record<string, string>>;
  routing: RoutingConfig;
  backup: BackupConfig;
  retention: RetentionConfig;
  storage: StorageConfig;
}

type JsonObject = { [key: string]: unknown };

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Objects merge key by key; arrays and scalars from `override` replace.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function crossFieldIssues(raw: RawConfig): string[] {
  const issues: string[] = [];
  const categories = new Set(Object.keys(raw.folders));

  const seen = new Map<string, string>();
  for (const [extension, category] of Object.entries(raw.routing.extensions)) {
    const normalized = extension.toLowerCase();
    const previous = seen.get(normalized);
    if (previous !== undefined && previous !== category) {
      issues.push(
        `routing.extensions: "${normalized}" maps to both "${previous}" and "${category}"`,
      );
    }
    seen.set(normalized, category);

    if (category !== raw.routing.fallbackCategory && !categories.has(category)) {
      issues.push(
        `routing.extensions: "${extension}" maps to unknown category "${category}"`,
      );
    }
  }

  const { provider } = raw.storage;
  if (provider === 'local-mirror' && !raw.storage.localMirror) {
    issues.push('storage.localMirror is required for provider "local-mirror"');
  }
  if (provider === 'cloud-object-store' && !raw.storage.objectStore) {
    issues.push(
      'storage.objectStore is required for provider "cloud-object-store"',
    );
  }
  if (provider === 'cloud-drive' && !raw.storage.drive) {
    issues.push('storage.drive is required for provider "cloud-drive"');
  }

  return issues;
}

function resolveConfig(raw: RawConfig): AppConfig {
  const baseDir = path.resolve(expandHome(raw.baseDir));
  const under = (target: string): string =>
    path.resolve(baseDir, expandHome(target));

  const folders: Record<string, string> = {};
  for (const [category, folder] of Object.entries(raw.folders)) {
    folders[category] = under(folder);
  }

  const extensions: Record<string, string> = {};
  for (const [extension, category] of Object.entries(raw.routing.extensions)) {
    extensions[extension.toLowerCase()] = category;
  }

  const backupDir = under(raw.backup.dir);
  const { localMirror, objectStore, drive } = raw.storage;

  return {
    companyName: raw.companyName,
    baseDir,
    dropZone: under(raw.dropZone),
    stateDir: raw.stateDir
      ? path.resolve(expandHome(raw.stateDir))
      : DEFAULT_STATE_DIR,
    folders,
    routing: {
      extensions,
      fallbackCategory: raw.routing.fallbackCategory,
      fallbackFolder: under(raw.routing.fallbackFolder),
      sniffContent: raw.routing.sniffContent,
      ignoreNames: raw.routing.ignoreNames,
      concurrency: raw.routing.concurrency,
    },
    backup: {
      dir: backupDir,
      archiveDir: path.join(backupDir, ARCHIVE_SUBDIR),
      stagingDir: path.join(backupDir, STAGING_SUBDIR),
      prefix: raw.backup.prefix,
      sourceDir: raw.backup.sourceDir ? under(raw.backup.sourceDir) : baseDir,
      excludePatterns: raw.backup.excludePatterns,
    },
    retention: { ...raw.retention },
    storage: {
      provider: raw.storage.provider,
      timeoutMs: raw.storage.timeoutMs,
      localMirror: localMirror ? { path: under(localMirror.path) } : undefined,
      objectStore: objectStore
        ? {
            bucket: objectStore.bucket,
            prefix: objectStore.prefix ?? '',
            command: objectStore.command ?? 's3cmd',
          }
        : undefined,
      drive: drive
        ? {
            remote: drive.remote,
            folder: drive.folder ?? '',
            command: drive.command ?? 'rclone',
          }
        : undefined,
    },
  };
}

/**
 * Validates an already-parsed configuration object (merged over defaults).
 * Throws ConfigError listing every problem found.
 */
export function parseConfig(
  input: unknown,
  env: NodeJS.ProcessEnv = {},
): AppConfig {
  const merged = deepMerge(defaultConfig, input);
  const baseOverride = env[BASE_DIR_ENV_VAR]?.trim();
  const withEnv =
    baseOverride && isPlainObject(merged)
      ? { ...merged, baseDir: baseOverride }
      : merged;

  const parsed = rawConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const where = issue.path.join('.');
        return where ? `${where}: ${issue.message}` : issue.message;
      }),
    );
  }

  const issues = crossFieldIssues(parsed.data);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return deepFreeze(resolveConfig(parsed.data));
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the user configuration file (if any) and returns the validated
 * configuration. Runs before anything touches the filesystem taxonomy.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[CONFIG_PATH_ENV_VAR];

  let userConfig: unknown = {};
  if (configPath) {
    const resolvedPath = path.resolve(expandHome(configPath));
    let text: string;
    try {
      text = fs.readFileSync(resolvedPath, 'utf8');
    } catch (error) {
      throw new ConfigError([
        `cannot read ${resolvedPath}: ${errorMessage(error)}`,
      ]);
    }
    try {
      userConfig = JSON.parse(text);
    } catch (error) {
      throw new ConfigError([
        `${resolvedPath} is not valid JSON: ${errorMessage(error)}`,
      ]);
    }
  }

  return parseConfig(userConfig, env);
}

export function retentionPolicy(config: AppConfig): RetentionPolicy {
  const { maxWorking, maxArchive, minSizeBytes } = config.retention;
  return { maxWorking, maxArchive, minSizeBytes };
}

/**
 * Every folder the taxonomy requires: category folders, the fallback, the
 * drop zone and the backup directories.
 */
export function requiredFolders(config: AppConfig): string[] {
  const folders = new Set<string>([
    ...Object.values(config.folders),
    config.routing.fallbackFolder,
    config.dropZone,
    config.backup.dir,
    config.backup.archiveDir,
  ]);
  return [...folders].sort();
}
