/**
 * Process-wide settings, built once at startup and passed explicitly into
 * every component. The returned value is deeply frozen.
 */
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { SettingsInputSchema, type SettingsInput } from '@agentos/schemas';
import { ConfigurationError } from './errors/index.js';
import { formatZodIssues } from './validation-utils.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const CLI_NAME = 'agentos';
export const CLI_VERSION = '1.4.3';

export interface SettingsPaths {
  readonly homeDir: string;
  readonly cwd: string;
  /** `~/.agent-os` */
  readonly baseRoot: string;
  readonly baseConfigFile: string;
  /** `<cwd>/.agent-os` */
  readonly projectRoot: string;
  readonly claudeInstructionsFile: string;
  readonly cursorLegacyFile: string;
  readonly cursorRulesDir: string;
  /** `setup/` in the source tree this CLI runs from */
  readonly developmentSetupDir: string;
  /** `<prefix>/share/agentos/setup` for packaged installs */
  readonly sharedSetupDir: string;
  /** `scripts/` and `setup/` under the base root */
  readonly installSearchDirs: readonly string[];
  readonly cwdSetupDir: string;
  readonly systemScriptDirs: readonly string[];
}

/**
 * Ordered lookup tables for project-type detection. Entries earlier in a
 * list win.
 */
export interface DetectionTables {
  readonly pythonFiles: readonly string[];
  readonly pythonVariants: readonly (readonly [file: string, projectType: string])[];
  readonly javascriptFiles: readonly string[];
  readonly javascriptFrameworks: readonly (readonly [dependency: string, projectType: string])[];
  readonly rustFiles: readonly string[];
  readonly goFiles: readonly string[];
  readonly javaMavenFiles: readonly string[];
  readonly javaGradleFiles: readonly string[];
  readonly cppFiles: readonly string[];
  readonly webFiles: readonly string[];
}

export interface Settings {
  readonly metadata: { readonly name: string; readonly version: string };
  readonly paths: SettingsPaths;
  readonly detection: DetectionTables;
  readonly execution: { readonly scriptTimeoutSeconds: number };
  readonly release: { readonly latestReleaseUrl: string; readonly timeoutMs: number };
}

export const DIR_NAMES = {
  base: '.agent-os',
  project: '.agent-os',
  scripts: 'scripts',
  setup: 'setup',
} as const;

export const FILE_NAMES = {
  baseConfig: 'config.yml',
  claudeInstructions: 'CLAUDE.md',
  cursorLegacy: '.cursorrules',
  cursorDir: '.cursor',
  cursorRulesDir: 'rules',
} as const;

export const DEFAULT_DETECTION: DetectionTables = {
  pythonFiles: [
    'pyproject.toml',
    'setup.py',
    'setup.cfg',
    'requirements.txt',
    'Pipfile',
    'poetry.lock',
    'uv.lock',
    '__init__.py',
  ],
  pythonVariants: [
    ['pyproject.toml', 'python-modern'],
    ['poetry.lock', 'python-poetry'],
    ['uv.lock', 'python-uv'],
  ],
  javascriptFiles: ['package.json', 'yarn.lock', 'package-lock.json', 'bun.lockb'],
  javascriptFrameworks: [
    ['next', 'javascript-nextjs'],
    ['react', 'javascript-react'],
    ['vue', 'javascript-vue'],
    ['express', 'javascript-express'],
  ],
  rustFiles: ['Cargo.toml'],
  goFiles: ['go.mod', 'go.sum'],
  javaMavenFiles: ['pom.xml'],
  javaGradleFiles: ['build.gradle', 'build.gradle.kts'],
  cppFiles: ['CMakeLists.txt', 'Makefile', 'configure.ac'],
  webFiles: ['index.html', 'index.htm', 'webpack.config.js', 'vite.config.js'],
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Builds the settings value.
 * @param input - Overrides; omitted paths come from the running process
 * @throws {ConfigurationError} When an override is out of range (e.g. a timeout above 3600)
 * @public
 */
export function createSettings(input: SettingsInput = {}): Settings {
  const parsed = SettingsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.invalidSchema('settings', formatZodIssues(parsed.error), parsed.error);
  }
  const options = parsed.data;

  const homeDir = options.homeDir ?? homedir();
  const cwd = options.cwd ?? process.cwd();
  const packageRoot = options.packageRoot ?? resolve(__dirname, '../../..');
  const sharePrefix = options.sharePrefix ?? dirname(dirname(process.execPath));
  const baseRoot = join(homeDir, DIR_NAMES.base);
  const projectRoot = join(cwd, DIR_NAMES.project);

  return deepFreeze<Settings>({
    metadata: { name: CLI_NAME, version: CLI_VERSION },
    paths: {
      homeDir,
      cwd,
      baseRoot,
      baseConfigFile: join(baseRoot, FILE_NAMES.baseConfig),
      projectRoot,
      claudeInstructionsFile: join(projectRoot, FILE_NAMES.claudeInstructions),
      cursorLegacyFile: join(projectRoot, FILE_NAMES.cursorLegacy),
      cursorRulesDir: join(projectRoot, FILE_NAMES.cursorDir, FILE_NAMES.cursorRulesDir),
      developmentSetupDir: join(packageRoot, DIR_NAMES.setup),
      sharedSetupDir: join(sharePrefix, 'share', CLI_NAME, DIR_NAMES.setup),
      installSearchDirs: [join(baseRoot, DIR_NAMES.scripts), join(baseRoot, DIR_NAMES.setup)],
      cwdSetupDir: join(cwd, DIR_NAMES.setup),
      systemScriptDirs: [...options.systemScriptDirs],
    },
    detection: DEFAULT_DETECTION,
    execution: { scriptTimeoutSeconds: options.scriptTimeoutSeconds },
    release: { latestReleaseUrl: options.latestReleaseUrl, timeoutMs: options.releaseTimeoutMs },
  });
}

/**
 * Reads overrides from the environment: AGENTOS_HOME and AGENTOS_SCRIPT_TIMEOUT.
 * @param env - Environment to read, normally `process.env`
 * @throws {ConfigurationError} When AGENTOS_SCRIPT_TIMEOUT is not an integer in 1..3600
 * @public
 */
export function settingsFromEnv(env: Record<string, string | undefined>): Settings {
  const input: SettingsInput = {};
  const home = env.AGENTOS_HOME?.trim();
  if (home) {
    input.homeDir = home;
  }
  const timeout = env.AGENTOS_SCRIPT_TIMEOUT?.trim();
  if (timeout) {
    input.scriptTimeoutSeconds = Number(timeout);
  }
  return createSettings(input);
}
