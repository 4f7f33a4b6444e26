/**
 * Zod schemas for WAPI response validation.
 */

import { z } from "zod";

export const ZoneRecordSchema = z.object({
  _ref: z.string().min(1),
  fqdn: z.string(),
  locked: z.boolean(),
  locked_by: z.string().optional(),
});

export const ZoneRecordListSchema = z.array(ZoneRecordSchema);
