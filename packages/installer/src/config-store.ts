/**
 * Loads the base configuration and derives installation status.
 *
 * Both values are cached after the first successful computation and dropped
 * together by `clearCache()`. Installer entry points clear them once a
 * state-changing branch has run.
 * @public
 * @see file:./project-type-detector.ts - Project type used in the status
 */
import { parse as parseYaml } from 'yaml';
import { ConfigDocumentSchema, type ConfigDocument } from '@agentos/schemas';
import { ALL_AGENTS, AgentKind, type InstallationStatus } from '@agentos/models';
import {
  ConfigurationError,
  createLogger,
  formatZodIssues,
  toError,
  type Settings,
} from '@agentos/core';
import { NodeConfigFileSystem, type IConfigFileSystem } from './fs/index.js';
import { ProjectTypeDetector } from './project-type-detector.js';
import type { IConfigStore } from './types/index.js';

const logger = createLogger('config-store');

export interface ConfigStoreOptions {
  fileSystem?: IConfigFileSystem;
  detector?: ProjectTypeDetector;
}

export class ConfigStore implements IConfigStore {
  private readonly fileSystem: IConfigFileSystem;
  private readonly detector: ProjectTypeDetector;
  private configCache?: ConfigDocument;
  private statusCache?: InstallationStatus;

  public constructor(
    private readonly settings: Settings,
    options: ConfigStoreOptions = {},
  ) {
    this.fileSystem = options.fileSystem ?? new NodeConfigFileSystem();
    this.detector =
      options.detector ?? new ProjectTypeDetector(settings.detection, this.fileSystem);
  }

  /**
   * Reads, parses and validates `<base-root>/config.yml`.
   * @returns The cached document on every call after the first success
   * @throws {ConfigurationError} `not_found`, `unreadable`, `invalid_syntax`, `invalid_shape` or `invalid_schema`
   */
  public loadConfig(): ConfigDocument {
    if (this.configCache) {
      return this.configCache;
    }

    const path = this.settings.paths.baseConfigFile;
    if (!this.fileSystem.exists(path)) {
      throw ConfigurationError.notFound(path);
    }

    let text: string;
    try {
      text = this.fileSystem.readFile(path);
    } catch (error) {
      throw ConfigurationError.unreadable(path, toError(error));
    }

    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (error) {
      throw ConfigurationError.invalidSyntax(path, toError(error));
    }

    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      throw ConfigurationError.invalidShape(path);
    }

    const result = ConfigDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw ConfigurationError.invalidSchema(path, formatZodIssues(result.error), result.error);
    }

    logger.debug({ path, version: result.data.agent_os_version }, 'Loaded base configuration');
    this.configCache = result.data;
    return result.data;
  }

  public clearCache(): void {
    this.configCache = undefined;
    this.statusCache = undefined;
  }

  /**
   * Computes what is installed. A base configuration that fails to load
   * reports BASE as not installed instead of throwing.
   */
  public getInstallStatus(): InstallationStatus {
    if (this.statusCache) {
      return this.statusCache;
    }

    const { paths } = this.settings;
    const status: InstallationStatus = {
      baseInstalled: false,
      projectInstalled: false,
      projectAgents: [],
    };

    if (this.fileSystem.exists(paths.baseRoot) && this.fileSystem.exists(paths.baseConfigFile)) {
      try {
        const config = this.loadConfig();
        status.baseInstalled = true;
        status.baseRoot = paths.baseRoot;
        status.baseVersion = config.agent_os_version;
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }
        logger.warn({ reason: error.reason, path: error.path }, error.message);
      }
    }

    if (this.fileSystem.exists(paths.projectRoot)) {
      status.projectInstalled = true;
      status.projectRoot = paths.projectRoot;
      status.projectAgents = ALL_AGENTS.filter((agent) => this.hasAgentMarker(agent));
      status.projectType = this.detector.detect(paths.cwd);
    }

    this.statusCache = Object.freeze(status);
    return this.statusCache;
  }

  private hasAgentMarker(agent: AgentKind): boolean {
    const { paths } = this.settings;
    switch (agent) {
      case AgentKind.CLAUDE_CODE:
        return this.fileSystem.exists(paths.claudeInstructionsFile);
      case AgentKind.CURSOR:
        return (
          this.fileSystem.isFile(paths.cursorLegacyFile) ||
          this.fileSystem.isDirectory(paths.cursorRulesDir)
        );
    }
  }
}
