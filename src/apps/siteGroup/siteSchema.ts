import { z } from 'zod';
import type { Site } from '../../core/model/Site.js';

export const SiteSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  url: z.string().optional(),
  groupIds: z.array(z.string()).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export function isSite(value: unknown): value is Site {
  return SiteSchema.safeParse(value).success;
}
