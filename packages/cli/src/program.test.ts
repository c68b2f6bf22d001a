import { describe, it, expect } from 'vitest';
import { InstallationError, OperationInterruptedError } from '@agentos/core';
import { ScopeSelector } from '@agentos/models';
import { runCli } from './program.js';
import { createTestCli } from './__tests__/test-utils.js';

describe('agentos install', () => {
  it('installs base with defaults and asks about the project', async () => {
    const cli = createTestCli(false);

    const code = await runCli(['install'], cli.context);

    expect(code).toBe(0);
    expect(cli.installer.installs).toEqual([
      {
        scope: 'base',
        enableClaudeCode: false,
        enableCursor: false,
        projectType: 'default',
        overwriteInstructions: false,
        overwriteStandards: false,
        overwriteConfig: false,
        skipBaseRequirement: false,
      },
    ]);
    expect(cli.prompters).toHaveLength(1);
    expect(cli.prompters[0]?.assumeYes).toBe(false);
    expect(cli.prompters[0]?.prompter.questions).toEqual([
      '🤔 Install AgentOS to current project as well?',
    ]);
  });

  it('continues with the project when --yes is given', async () => {
    const cli = createTestCli(false);

    const code = await runCli(['install', '--yes', '--claude-code'], cli.context);

    expect(code).toBe(0);
    expect(cli.prompters[0]?.assumeYes).toBe(true);
    expect(cli.installer.installs.map((request) => request.scope)).toEqual(['base', 'project']);
    expect(cli.installer.installs[1]?.enableClaudeCode).toBe(true);
  });

  it('installs only the project with --project', async () => {
    const cli = createTestCli(true);

    const code = await runCli(
      ['install', '--project', '--cursor', '--project-type', 'python', '--overwrite-standards'],
      cli.context,
    );

    expect(code).toBe(0);
    expect(cli.installer.installs).toHaveLength(1);
    expect(cli.installer.installs[0]).toMatchObject({
      scope: 'project',
      enableCursor: true,
      projectType: 'python',
      overwriteStandards: true,
      skipBaseRequirement: false,
    });
    expect(cli.prompters[0]?.prompter.questions).toEqual([]);
  });

  it('maps --no-base to a project install that skips the base requirement', async () => {
    const cli = createTestCli(true);

    await runCli(['install', '--no-base'], cli.context);

    expect(cli.installer.installs).toHaveLength(1);
    expect(cli.installer.installs[0]).toMatchObject({
      scope: 'project',
      skipBaseRequirement: true,
    });
  });

  it('reports a known failure with exit code 1', async () => {
    const cli = createTestCli();
    cli.installer.failure = new InstallationError('Base installation failed: boom');

    const code = await runCli(['install'], cli.context);

    expect(code).toBe(1);
    expect(cli.reporter.messages('error')).toEqual([
      'Installation failed: Base installation failed: boom',
    ]);
    expect(cli.installer.installs).toHaveLength(1);
  });

  it('labels errors outside the taxonomy as unexpected', async () => {
    const cli = createTestCli();
    cli.installer.failure = new Error('kaboom');

    const code = await runCli(['install'], cli.context);

    expect(code).toBe(1);
    expect(cli.reporter.messages('error')).toEqual([
      'Unexpected error during installation: kaboom',
    ]);
  });

  it('exits with 130 when a prompt is interrupted', async () => {
    const cli = createTestCli();
    cli.installer.failure = new OperationInterruptedError();

    const code = await runCli(['install'], cli.context);

    expect(code).toBe(130);
    expect(cli.reporter.messages('warn')).toEqual(['AgentOS CLI interrupted by user']);
    expect(cli.reporter.messages('error')).toEqual([]);
  });
});

describe('agentos update and uninstall', () => {
  it('targets both scopes by default', async () => {
    const cli = createTestCli();

    expect(await runCli(['update'], cli.context)).toBe(0);
    expect(await runCli(['uninstall'], cli.context)).toBe(0);

    expect(cli.installer.updates).toEqual([ScopeSelector.BOTH]);
    expect(cli.installer.uninstalls).toEqual([ScopeSelector.BOTH]);
  });

  it('targets the project only with --project', async () => {
    const cli = createTestCli();

    await runCli(['update', '--project'], cli.context);
    await runCli(['uninstall', '--project', '-y'], cli.context);

    expect(cli.installer.updates).toEqual([ScopeSelector.PROJECT_ONLY]);
    expect(cli.installer.uninstalls).toEqual([ScopeSelector.PROJECT_ONLY]);
    expect(cli.prompters.map((entry) => entry.assumeYes)).toEqual([false, true]);
  });

  it('prefixes failures with the command name', async () => {
    const cli = createTestCli();
    cli.installer.failure = new InstallationError('nothing here');

    expect(await runCli(['update'], cli.context)).toBe(1);
    expect(await runCli(['uninstall'], cli.context)).toBe(1);

    expect(cli.reporter.messages('error')).toEqual([
      'Update failed: nothing here',
      'Uninstall failed: nothing here',
    ]);
  });
});

describe('agentos version', () => {
  it('prints the CLI version and installation status', async () => {
    const cli = createTestCli();
    cli.installer.status = {
      baseInstalled: true,
      baseRoot: '/home/dev/.agent-os',
      baseVersion: '1.4.3',
      projectInstalled: false,
      projectAgents: [],
    };

    const code = await runCli(['version'], cli.context);

    expect(code).toBe(0);
    expect(cli.reporter.messages('info')).toEqual([
      'AgentOS CLI v1.4.3',
      'Base installation: ✅ Installed (v1.4.3) at /home/dev/.agent-os',
      'Project installation: ❌ Not installed',
    ]);
  });

  it('prints the bare version for -V', async () => {
    const cli = createTestCli();

    const code = await runCli(['-V'], cli.context);

    expect(code).toBe(0);
    expect(cli.stdout.join('')).toBe('1.4.3\n');
  });
});

describe('argument errors', () => {
  it('rejects an unknown command', async () => {
    const cli = createTestCli();

    const code = await runCli(['bogus'], cli.context);

    expect(code).toBe(1);
    expect(cli.stderr.join('')).toContain("unknown command 'bogus'");
  });

  it('rejects an unknown option', async () => {
    const cli = createTestCli();

    const code = await runCli(['install', '--frobnicate'], cli.context);

    expect(code).toBe(1);
    expect(cli.stderr.join('')).toContain("unknown option '--frobnicate'");
    expect(cli.installer.installs).toEqual([]);
  });
});
