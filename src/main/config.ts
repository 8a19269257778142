import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import { readJsonFile } from "./store";

export const CONFIG_FILE_NAME = "mod-checker.json";

const ConfigSchema = z
  .object({
    // Dependency ids the game or loader provides without a jar in mods/.
    builtinProviders: z.array(z.string().min(1)).default(["forge", "minecraft"]),
    crashLogLimit: z.number().int().positive().default(5),
    crashLogExtensions: z.array(z.string().startsWith(".")).default([".log"]),
    crashReportsDir: z.string().min(1).optional()
  })
  .strict();

export type CheckerConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): CheckerConfig {
  return ConfigSchema.parse({});
}

export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): { filePath: string; required: boolean } {
  if (explicit) return { filePath: path.resolve(cwd, explicit), required: true };
  const fromEnv = String(env.MOD_CHECKER_CONFIG || "").trim();
  if (fromEnv) return { filePath: path.resolve(cwd, fromEnv), required: true };
  return { filePath: path.join(cwd, CONFIG_FILE_NAME), required: false };
}

export function loadConfig(filePath: string, required = false): CheckerConfig {
  let raw: unknown;
  try {
    raw = readJsonFile(filePath);
  } catch (err) {
    throw new ConfigError(filePath, errorMessage(err), { cause: err });
  }

  if (raw === null) {
    if (required) throw new ConfigError(filePath, "file does not exist");
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(filePath, detail);
  }
  // Relative crash report paths are taken from the config file's folder.
  const crashReportsDir = parsed.data.crashReportsDir
    ? path.resolve(path.dirname(filePath), parsed.data.crashReportsDir)
    : undefined;
  return { ...parsed.data, crashReportsDir };
}
