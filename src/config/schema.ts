import { z } from "zod";

// zod still runs the refinement after .url() has failed, so it must not throw.
const httpsUrl = z.string().url().refine(isHttpsUrl, { message: "installer URLs must use https" });

const commandLine = z.array(z.string().min(1)).min(1);

const installMethodSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("remote-script"),
    url: httpsUrl,
    args: z.array(z.string()).default([]),
    /** Directories, relative to the user base directory, that the installed toolchain adds to PATH. */
    path_additions: z.array(z.string().min(1)).default([]),
  }),
  z.object({
    method: z.literal("system-dialog"),
    command: commandLine,
  }),
  z.object({
    method: z.literal("manual"),
    hint: z.string().min(1),
  }),
]);

export const toolchainSpecSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  /** process.platform values this toolchain applies to; empty means all. */
  platforms: z.array(z.string()).default([]),
  probe: z.object({
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    version: commandLine.optional(),
  }),
  install: installMethodSchema,
});

export const bootstrapConfigSchema = z.object({
  binary: z.string().regex(/^[A-Za-z0-9._-]+$/, "binary must be a bare file name"),
  getting_started: z.string().min(1),
  build_system: z.literal("cargo"),
  targets: z.object({
    system_dir: z.string().min(1),
    user_base_var: z.string().min(1),
    user_base_default: z.string().min(1),
    user_bin_subdir: z.string().min(1),
  }),
  toolchains: z.array(toolchainSpecSchema),
});

function isHttpsUrl(value: string): boolean {
  try {
    return new URL(value).protocol === "https:";
  } catch {
    return false;
  }
}
