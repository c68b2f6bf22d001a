/**
 * Finds an install script by name across the known setup directories.
 * @public
 */
import { join } from 'path';
import { createLogger, type IReporter, NoOpReporter, type Settings } from '@agentos/core';
import { NodeConfigFileSystem, type IConfigFileSystem } from '../fs/index.js';

const logger = createLogger('script-locator');

export interface ScriptLocatorOptions {
  fileSystem?: IConfigFileSystem;
  reporter?: IReporter;
}

export class ScriptLocator {
  private readonly fileSystem: IConfigFileSystem;
  private readonly reporter: IReporter;

  public constructor(
    private readonly settings: Settings,
    options: ScriptLocatorOptions = {},
  ) {
    this.fileSystem = options.fileSystem ?? new NodeConfigFileSystem();
    this.reporter = options.reporter ?? new NoOpReporter();
  }

  /**
   * Directories searched, highest priority first: the development tree,
   * shared package data, the base root, the working directory, then system
   * binary directories.
   */
  public searchDirectories(): string[] {
    const { paths } = this.settings;
    return [
      paths.developmentSetupDir,
      paths.sharedSetupDir,
      ...paths.installSearchDirs,
      paths.cwdSetupDir,
      ...paths.systemScriptDirs,
    ];
  }

  /**
   * @param scriptName - File name such as `base.sh`
   * @returns Path of the first executable regular file found, or undefined
   */
  public locate(scriptName: string): string | undefined {
    for (const directory of this.searchDirectories()) {
      const candidate = join(directory, scriptName);
      if (!this.fileSystem.isFile(candidate)) {
        continue;
      }
      if (!this.fileSystem.isExecutable(candidate)) {
        logger.warn({ candidate }, 'Skipping non-executable script');
        this.reporter.warn(`Script ${candidate} found but not executable`);
        continue;
      }
      logger.debug({ candidate }, 'Located script');
      return candidate;
    }
    logger.debug({ scriptName }, 'Script not found');
    return undefined;
  }
}
