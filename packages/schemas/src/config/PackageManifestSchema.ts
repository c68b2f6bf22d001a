import { z } from 'zod';

const DependencyMapSchema = z.record(z.unknown());

/**
 * The slice of a `package.json` read by project-type detection.
 */
export const PackageManifestSchema = z
  .object({
    dependencies: DependencyMapSchema.optional(),
    devDependencies: DependencyMapSchema.optional(),
  })
  .passthrough();
