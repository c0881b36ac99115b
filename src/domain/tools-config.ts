import { z } from 'zod';

/**
 * `conf.json` in the tool's data directory. Only the workspace lists are
 * consumed here; other fields belong to other tools and are kept as-is.
 */
export const ToolsConfigSchema = z
  .object({
    // null reads as an empty list, like an absent key
    'go-workspaces': z.array(z.string()).nullish().transform((v) => v ?? []),
    'vdl-workspaces': z.array(z.string()).nullish().transform((v) => v ?? []),
  })
  .passthrough();

export type ToolsConfigData = z.infer<typeof ToolsConfigSchema>;

export class ToolsConfig {
  constructor(private readonly data: ToolsConfigData) {}

  /** Root-relative directories appended to GOPATH. */
  goWorkspaces(): readonly string[] {
    return this.data['go-workspaces'];
  }

  /** Root-relative directories appended to VDLPATH. */
  vdlWorkspaces(): readonly string[] {
    return this.data['vdl-workspaces'];
  }

  raw(): ToolsConfigData {
    return this.data;
  }
}

/**
 * Project/tool registry, as read from the manifest by the outer tool.
 * A relative project path is relative to the root.
 */
export const ProjectRegistrySchema = z.object({
  projects: z.record(z.string(), z.object({ path: z.string().min(1) })),
  tools: z.record(z.string(), z.object({ project: z.string().min(1), data: z.string() })),
});

export type ProjectRegistry = z.infer<typeof ProjectRegistrySchema>;
