import type { z } from 'zod';
import type {
  AgentSettingSchema,
  ConfigDocumentSchema,
  InstallRequestSchema,
  PackageManifestSchema,
  ProjectTypeConfigSchema,
  ReleaseResponseSchema,
  SettingsInputSchema,
} from './config/index.js';

export * from './config/index.js';

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
export type AgentSetting = z.infer<typeof AgentSettingSchema>;
export type ProjectTypeConfig = z.infer<typeof ProjectTypeConfigSchema>;
export type InstallRequestInput = z.input<typeof InstallRequestSchema>;
export type SettingsInput = z.input<typeof SettingsInputSchema>;
export type ReleaseResponse = z.infer<typeof ReleaseResponseSchema>;
export type PackageManifest = z.infer<typeof PackageManifestSchema>;
