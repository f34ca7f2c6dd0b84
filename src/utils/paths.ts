import { isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Centralized path resolution for the engine.
 * All file paths the engine writes (logs, snapshots) go through this singleton.
 */
export class PathResolver {
  private static instance: PathResolver;

  private dataDirOverride: string | undefined;

  private constructor() {}

  public static getInstance(): PathResolver {
    if (!PathResolver.instance) {
      PathResolver.instance = new PathResolver();
    }
    return PathResolver.instance;
  }

  /**
   * Get the engine data directory path.
   *
   * An explicit setDataDir() wins; otherwise reads CONTEXT_ENGINE_DATA_DIR,
   * defaulting to './data'.
   * Relative paths are resolved against the current working directory.
   *
   * @example
   * // CONTEXT_ENGINE_DATA_DIR not set → '/path/to/cwd/data'
   * // CONTEXT_ENGINE_DATA_DIR='~/ctx' → '/home/me/ctx'
   */
  public get dataDir(): string {
    return this.resolveDataDir(this.dataDirOverride ?? process.env.CONTEXT_ENGINE_DATA_DIR ?? 'data');
  }

  /** Pin the data directory. `undefined` goes back to the environment. */
  public setDataDir(dataDir: string | undefined): void {
    this.dataDirOverride = dataDir;
  }

  public resolveDataDir(dataDir: string): string {
    if (dataDir.startsWith('~')) {
      return join(homedir(), dataDir.slice(1));
    }
    if (isAbsolute(dataDir)) {
      return dataDir;
    }
    return resolve(process.cwd(), dataDir);
  }

  /**
   * Resolve a path relative to the data directory
   * @example paths.fromDataDir('logs') → '/path/to/cwd/data/logs'
   */
  public fromDataDir(...segments: string[]): string {
    return join(this.dataDir, ...segments);
  }
}

export const paths = PathResolver.getInstance();
