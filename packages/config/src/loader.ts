import { readFileSync, existsSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { NotFoundError, ValidationError } from '@servefs/utils';
import { ServerConfigSchema, type MountConfig, type ServerConfig } from './types';

export const CONFIG_FILENAME = 'servefs.json';

/**
 * Find the project root by looking for servefs.json
 */
export function findProjectRoot(startPath: string = process.cwd()): string | null {
  let currentPath = resolve(startPath);

  while (true) {
    if (existsSync(join(currentPath, CONFIG_FILENAME))) {
      return currentPath;
    }
    const parent = dirname(currentPath);
    if (parent === currentPath) {
      return null;
    }
    currentPath = parent;
  }
}

export interface LoadServerConfigOptions {
  /** Explicit config file; otherwise servefs.json in `projectRoot` */
  configPath?: string;
  /** Defaults to the nearest directory holding servefs.json */
  projectRoot?: string;
  /** Environment used for HOST / PORT / LOG_LEVEL overrides */
  env?: NodeJS.ProcessEnv;
}

function locateConfigFile(options: LoadServerConfigOptions): string {
  if (options.configPath) {
    return resolve(options.configPath);
  }
  const root = options.projectRoot ?? findProjectRoot();
  if (!root) {
    throw new NotFoundError(`Project root (no ${CONFIG_FILENAME} found)`);
  }
  return join(root, CONFIG_FILENAME);
}

function applyEnvOverrides(data: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return data;
  }
  const merged: Record<string, unknown> = { ...data };
  if (env.HOST) {
    merged.host = env.HOST;
  }
  if (env.PORT) {
    const port = Number(env.PORT);
    merged.port = Number.isFinite(port) ? port : env.PORT;
  }
  if (env.LOG_LEVEL) {
    merged.logLevel = env.LOG_LEVEL;
  }
  return merged;
}

function resolveMountPaths(mount: MountConfig, baseDir: string): MountConfig {
  const absolute = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));
  if (mount.type === 'directory') {
    return { ...mount, root: absolute(mount.root) };
  }
  return { ...mount, file: absolute(mount.file) };
}

/**
 * Load and validate the server configuration
 *
 * Relative `root` and `file` paths are resolved against the directory that
 * holds the config file.
 *
 * @throws NotFoundError when the config file cannot be located
 * @throws ValidationError when the file is not valid JSON or fails the schema
 */
export function loadServerConfig(options: LoadServerConfigOptions = {}): ServerConfig {
  const configPath = locateConfigFile(options);

  if (!existsSync(configPath)) {
    throw new NotFoundError('Configuration file', configPath);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Configuration file is not valid JSON: ${configPath}`, {
      path: configPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = ServerConfigSchema.safeParse(applyEnvOverrides(data, options.env ?? process.env));

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid server configuration: ${issues.join('; ')}`, {
      path: configPath,
      issues,
    });
  }

  const baseDir = dirname(configPath);
  return {
    ...result.data,
    mounts: result.data.mounts.map((mount) => resolveMountPaths(mount, baseDir)),
  };
}
