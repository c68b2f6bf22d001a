/**
 * Guesses a project's language and framework from marker files.
 *
 * Families are tried in a fixed order (Python, JavaScript, Rust, Go, Java,
 * C/C++, web) and the first family with a marker present decides the result.
 * @example
 * ```typescript
 * const detector = new ProjectTypeDetector(settings.detection);
 * detector.detect('/work/app'); // 'javascript-react'
 * ```
 * @public
 */
import { join } from 'path';
import { PackageManifestSchema } from '@agentos/schemas';
import { createLogger, type DetectionTables } from '@agentos/core';
import { NodeConfigFileSystem, type IConfigFileSystem } from './fs/index.js';

const logger = createLogger('project-type-detector');

export const DEFAULT_PROJECT_TYPE = 'default';

export class ProjectTypeDetector {
  public constructor(
    private readonly tables: DetectionTables,
    private readonly fileSystem: IConfigFileSystem = new NodeConfigFileSystem(),
  ) {}

  /**
   * Returns the project type for `root`, or `default` when nothing matches.
   * Never throws.
   * @param root - Directory to inspect, normally the working directory
   */
  public detect(root: string): string {
    try {
      return this.detectFamily(root) ?? DEFAULT_PROJECT_TYPE;
    } catch (error) {
      logger.warn({ err: error, root }, 'Project type detection failed');
      return DEFAULT_PROJECT_TYPE;
    }
  }

  private detectFamily(root: string): string | undefined {
    const { tables } = this;
    const has = (file: string): boolean => this.fileSystem.exists(join(root, file));
    const hasAny = (files: readonly string[]): boolean => files.some(has);

    if (hasAny(tables.pythonFiles)) {
      return tables.pythonVariants.find(([file]) => has(file))?.[1] ?? 'python';
    }
    if (hasAny(tables.javascriptFiles)) {
      return this.detectJavaScriptFramework(root) ?? 'javascript';
    }
    if (hasAny(tables.rustFiles)) {
      return 'rust';
    }
    if (hasAny(tables.goFiles)) {
      return 'go';
    }
    if (hasAny(tables.javaMavenFiles)) {
      return 'java-maven';
    }
    if (hasAny(tables.javaGradleFiles)) {
      return 'java-gradle';
    }
    if (hasAny(tables.cppFiles)) {
      return 'cpp';
    }
    if (hasAny(tables.webFiles)) {
      return 'web';
    }
    return undefined;
  }

  private detectJavaScriptFramework(root: string): string | undefined {
    const manifestPath = join(root, 'package.json');
    if (!this.fileSystem.exists(manifestPath)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(this.fileSystem.readFile(manifestPath));
    } catch (error) {
      logger.debug({ err: error, manifestPath }, 'Unreadable package.json');
      return undefined;
    }

    const manifest = PackageManifestSchema.safeParse(raw);
    if (!manifest.success) {
      return undefined;
    }

    const dependencies = {
      ...manifest.data.dependencies,
      ...manifest.data.devDependencies,
    };
    return this.tables.javascriptFrameworks.find(([dependency]) =>
      Object.hasOwn(dependencies, dependency),
    )?.[1];
  }
}
