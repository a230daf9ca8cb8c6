import type { z } from "zod";
import type { bootstrapConfigSchema, toolchainSpecSchema } from "../config/schema.js";

/** Validated contents of config/bootstrap.yaml. */
export type BootstrapConfig = z.infer<typeof bootstrapConfigSchema>;

export type ToolchainSpec = z.infer<typeof toolchainSpecSchema>;
