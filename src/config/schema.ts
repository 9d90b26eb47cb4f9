import { z } from 'zod';

const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : [value]));

export const RawDiscoverSchema = z
  .object({
    how: z.string().optional(),
    name: z.string().optional(),
    url: z.string().min(1, 'url must not be empty').optional(),
    ref: z.string().min(1, 'ref must not be empty').optional(),
    path: z.string().min(1, 'path must not be empty').optional(),
    test: stringList.optional(),
    filter: stringList.optional(),
    only_modified: z.boolean().optional(),
    reference_url: z.string().min(1, 'reference_url must not be empty').optional(),
    reference_ref: z.string().min(1, 'reference_ref must not be empty').optional(),
  })
  .passthrough();

// Keys as written in plan files or by hosts: dashed spellings and the legacy
// repository/revision names are folded onto the canonical keys.
const KEY_ALIASES: Record<string, string> = {
  'only-modified': 'only_modified',
  'reference-url': 'reference_url',
  'reference-ref': 'reference_ref',
  repository: 'url',
  revision: 'ref',
};

export function normalizeKeys(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!(key in KEY_ALIASES)) result[key] = value;
  }
  // Legacy and dashed keys win over canonical ones when both are present.
  for (const [alias, canonical] of Object.entries(KEY_ALIASES)) {
    if (alias in data) result[canonical] = data[alias];
  }
  return result;
}
