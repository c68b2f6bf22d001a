export { AgentKindSchema, AgentSettingSchema } from './AgentSettingSchema.js';
export { ProjectTypeConfigSchema } from './ProjectTypeConfigSchema.js';
export { ConfigDocumentSchema } from './ConfigDocumentSchema.js';
export { ProjectTypeTokenSchema, findProjectTypeViolation } from './ProjectTypeTokenSchema.js';
export { InstallationScopeSchema, InstallRequestSchema } from './InstallRequestSchema.js';
export {
  SettingsInputSchema,
  DEFAULT_SCRIPT_TIMEOUT_SECONDS,
  DEFAULT_RELEASE_TIMEOUT_MS,
  DEFAULT_LATEST_RELEASE_URL,
} from './SettingsInputSchema.js';
export { ReleaseResponseSchema } from './ReleaseResponseSchema.js';
export { PackageManifestSchema } from './PackageManifestSchema.js';
