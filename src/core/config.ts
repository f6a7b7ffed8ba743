import { z } from "zod";

const ExportSchema = z
  .object({
    indent: z.number().int().min(1).max(8).default(4),
  })
  .strict();

const ValidationSchema = z
  .object({
    structure: z.boolean().default(true),
    endpoints: z.boolean().default(true),
    topology: z.boolean().default(true),
  })
  .strict();

const LogSchema = z
  .object({
    // JSONL event log; relative paths resolve against the config file.
    file: z.string().min(1).nullable().default(null),
  })
  .strict();

const OutputSchema = z
  .object({
    color: z.enum(["auto", "always", "never"]).default("auto"),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    export: ExportSchema.default({}),
    validation: ValidationSchema.default({}),
    log: LogSchema.default({}),
    output: OutputSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ColorMode = ProjectConfig["output"]["color"];

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
