import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { ScopeSelector } from '@agentos/models';
import { Installer } from '../installer.js';
import {
  createTempWorkspace,
  createTestContext,
  writeBaseConfig,
  type TempWorkspace,
  type TestContext,
} from './test-utils.js';

describe('Installer.uninstall', () => {
  let workspace: TempWorkspace;
  let context: TestContext;
  let installer: Installer;

  function useContext(confirm: boolean): void {
    context = createTestContext(workspace.settings, { confirm });
    installer = new Installer(context);
  }

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    useContext(true);
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('reports and does nothing for project-only without a project', async () => {
    await installer.uninstall(ScopeSelector.PROJECT_ONLY);

    expect(context.reporter.messages('warn')).toEqual(['No project installation found to remove']);
    expect(context.prompter.questions).toEqual([]);
  });

  it('reports and does nothing when neither scope is installed', async () => {
    await installer.uninstall(ScopeSelector.BOTH);

    expect(context.reporter.messages('warn')).toEqual(['No AgentOS installation found to remove']);
  });

  it('removes only the project root for project-only', async () => {
    const { paths } = workspace.settings;
    await writeBaseConfig(workspace.settings);
    await mkdir(`${paths.projectRoot}/instructions`, { recursive: true });

    await installer.uninstall(ScopeSelector.PROJECT_ONLY);

    expect(existsSync(paths.projectRoot)).toBe(false);
    expect(existsSync(paths.baseRoot)).toBe(true);
    expect(context.prompter.questions).toEqual([
      `Remove project installation at ${paths.projectRoot}?`,
    ]);
  });

  it('removes project first, then base', async () => {
    const { paths } = workspace.settings;
    await writeBaseConfig(workspace.settings);
    await mkdir(paths.projectRoot, { recursive: true });

    await installer.uninstall(ScopeSelector.BOTH);

    expect(context.prompter.questions).toEqual([
      `Remove project installation at ${paths.projectRoot}?`,
      `Remove base installation at ${paths.baseRoot}?`,
    ]);
    expect(existsSync(paths.projectRoot)).toBe(false);
    expect(existsSync(paths.baseRoot)).toBe(false);
    expect(context.reporter.messages('success')).toEqual([
      '✅ Project installation removed successfully',
      '✅ Base installation removed successfully',
    ]);
  });

  it('keeps directories when removal is declined', async () => {
    useContext(false);
    const { paths } = workspace.settings;
    await mkdir(paths.projectRoot, { recursive: true });

    await installer.uninstall(ScopeSelector.BOTH);

    expect(existsSync(paths.projectRoot)).toBe(true);
    expect(context.reporter.messages('success')).toEqual([]);
  });

  it('reflects the removal in the next status', async () => {
    await mkdir(workspace.settings.paths.projectRoot, { recursive: true });
    expect(installer.getInstallStatus().projectInstalled).toBe(true);

    await installer.uninstall(ScopeSelector.PROJECT_ONLY);

    expect(installer.getInstallStatus().projectInstalled).toBe(false);
  });
});
