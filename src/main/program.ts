import path from "node:path";
import { Command } from "commander";
import { runModCheck } from "./checker";
import { loadConfig, resolveConfigPath } from "./config";
import { ModCheckerError, ModsFolderNotFoundError, errorMessage } from "./errors";
import { createLogger, promptYesNo, type ConfirmFn, type LogSink, type Logger } from "./logging";
import { detectDefaultModsFolder } from "./paths";

export const CLI_NAME = "mod-checker";
export const CLI_VERSION = "0.1.0";

type CliOptions = {
  yes?: boolean;
  pruneDuplicates?: boolean;
  config?: string;
  verbose?: boolean;
};

export type ProgramDeps = {
  confirm?: ConfirmFn;
  sink?: LogSink;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  // used to find the default mods folder
  home?: string;
  platform?: NodeJS.Platform;
};

function resolveModsDir(arg: string | undefined, cwd: string, deps: ProgramDeps, log: Logger): string {
  if (arg) return path.resolve(cwd, arg);
  const detected = detectDefaultModsFolder(deps.platform, deps.home, deps.env);
  if (!detected) throw new ModsFolderNotFoundError(null);
  log.info(`Auto-detected Minecraft mods folder: ${detected}`);
  return detected;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const cwd = deps.cwd ?? process.cwd();
  return new Command()
    .name(CLI_NAME)
    .version(CLI_VERSION)
    .description("Check a Minecraft mods folder for loader conflicts, duplicate ids and missing dependencies.")
    .argument("[modsDir]", "path to the mods folder (auto-detected when omitted)")
    .option("-y, --yes", "delete without asking")
    .option("--prune-duplicates", "offer to delete older copies of duplicated mods")
    .option("-c, --config <file>", "path to a mod-checker.json config file")
    .option("-v, --verbose", "print debug output")
    .action(async (modsDirArg: string | undefined, opts: CliOptions) => {
      const log = createLogger({ verbose: opts.verbose, sink: deps.sink });
      try {
        const { filePath, required } = resolveConfigPath(opts.config, deps.env, cwd);
        const config = loadConfig(filePath, required);
        log.debug(`Config: ${JSON.stringify(config)}`);
        const modsDir = resolveModsDir(modsDirArg, cwd, deps, log);
        await runModCheck(
          { modsDir, config, assumeYes: opts.yes, pruneDuplicates: opts.pruneDuplicates },
          { log, confirm: deps.confirm ?? promptYesNo }
        );
      } catch (err) {
        if (!(err instanceof ModCheckerError) && err instanceof Error && err.stack) log.debug(err.stack);
        log.error(errorMessage(err));
        process.exitCode = 1;
      }
    });
}
