import { z } from 'zod';

// Only the tag is read; the rest of the release payload is ignored.
export const ReleaseResponseSchema = z
  .object({
    tag_name: z.string(),
  })
  .passthrough();
