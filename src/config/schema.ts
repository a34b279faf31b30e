/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * Repository layout schema
 * Paths are relative to the project (git work tree) root
 */
export const LayoutSettingsSchema = z.object({
  metadata_root: z.string().min(1).default('src'),
  static_resource_dir: z.string().min(1).default('staticresources'),
  deploy_root: z.string().min(1).default('changeSetDeploy/src'),
});

/**
 * Staging area schema
 */
export const StagingSettingsSchema = z.object({
  // null resolves to os.tmpdir() at run time
  base_dir: z.string().min(1).nullable().default(null),
});

/**
 * Version-control settings schema
 */
export const VcsSettingsSchema = z.object({
  full_snapshot_sentinel: z.string().min(1).default('FD'),
  git_binary: z.string().min(1).default('git'),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  log_to_file: z.boolean().default(true),
  logs_dir: z.string().min(1).default('.srpack/logs'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  layout: LayoutSettingsSchema.default({
    metadata_root: 'src',
    static_resource_dir: 'staticresources',
    deploy_root: 'changeSetDeploy/src',
  }),
  staging: StagingSettingsSchema.default({
    base_dir: null,
  }),
  vcs: VcsSettingsSchema.default({
    full_snapshot_sentinel: 'FD',
    git_binary: 'git',
  }),
  output: OutputSettingsSchema.default({
    verbose: false,
    log_to_file: true,
    logs_dir: '.srpack/logs',
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LayoutSettings = z.infer<typeof LayoutSettingsSchema>;
export type StagingSettings = z.infer<typeof StagingSettingsSchema>;
export type VcsSettings = z.infer<typeof VcsSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
