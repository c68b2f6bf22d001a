import { z } from 'zod';

export const DEFAULT_SCRIPT_TIMEOUT_SECONDS = 600;
export const DEFAULT_RELEASE_TIMEOUT_MS = 10_000;
export const DEFAULT_LATEST_RELEASE_URL =
  'https://api.github.com/repos/buildermethods/agent-os/releases/latest';

/**
 * Overrides accepted by `createSettings`. Anything omitted falls back to the
 * process environment (home directory, cwd) or the defaults below.
 */
export const SettingsInputSchema = z.object({
  homeDir: z.string().min(1).optional(),
  cwd: z.string().min(1).optional(),
  packageRoot: z.string().min(1).optional(),
  sharePrefix: z.string().min(1).optional(),
  systemScriptDirs: z.array(z.string().min(1)).default(['/usr/local/bin', '/usr/bin']),
  scriptTimeoutSeconds: z
    .number()
    .int()
    .min(1)
    .max(3600)
    .default(DEFAULT_SCRIPT_TIMEOUT_SECONDS),
  latestReleaseUrl: z.string().url().default(DEFAULT_LATEST_RELEASE_URL),
  releaseTimeoutMs: z.number().int().positive().default(DEFAULT_RELEASE_TIMEOUT_MS),
});
