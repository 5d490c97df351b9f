import { z } from "zod";

const envSchema = z.object({
  FEEDTREE_ITEMS_FILENAME: z.string().min(1).default("rss_items.json"),
  FEEDTREE_ROOT_FILENAME: z.string().min(1).default("rss_root.json"),
  FEEDTREE_OUTPUT_FILENAME: z.string().min(1).default("rss.xml"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  NO_COLOR: z
    .string()
    .optional()
    .transform((v) => v !== undefined && v !== ""),
  FORCE_COLOR: z
    .string()
    .optional()
    .transform((v): boolean | undefined => (v === undefined ? undefined : v !== "0")),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export const env: Env = loadEnv(process.env);
