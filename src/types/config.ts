import { z } from "zod";

/** Engine configuration as written in config.yaml (snake_case keys). */
export const EngineConfigSchema = z.object({
  cli: z.object({
    binary: z.string().min(1),
    max_attempts: z.number().int().min(1),
    verbose_compile: z.boolean(),
  }),
  workdir: z.string().min(1).nullable(),
  cache: z.object({
    dir: z.string().min(1).nullable(),
    stale_fallback: z.boolean(),
  }),
  default_fqbn: z.string().min(1),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
