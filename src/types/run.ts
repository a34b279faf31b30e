/**
 * Run report type definitions
 */

import { z } from 'zod';
import { RepresentationSchema, RunModeSchema } from './resource.js';

export const UnitStatusSchema = z.enum(['staged', 'skipped', 'removed', 'planned']);
export type UnitStatus = z.infer<typeof UnitStatusSchema>;

export const UnitReportSchema = z.object({
  name: z.string(),
  representation: RepresentationSchema,
  hasDescriptor: z.boolean(),
  status: UnitStatusSchema,
  artifacts: z.array(z.string()),
});
export type UnitReport = z.infer<typeof UnitReportSchema>;

/**
 * Summary of one pipeline run, printed by `deploy --json` and `plan --json`
 */
export const RunReportSchema = z.object({
  target: z.string(),
  mode: RunModeSchema,
  revisionA: z.string(),
  revisionB: z.string().nullable(),
  startedAt: z.string(),
  finishedAt: z.string(),
  stagingDir: z.string().nullable(),
  deployDir: z.string(),
  units: z.array(UnitReportSchema),
  promoted: z.array(z.string()),
  ignoredPaths: z.array(z.string()),
});
export type RunReport = z.infer<typeof RunReportSchema>;
