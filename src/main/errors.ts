// Errors that end a run. Anything recoverable (a broken jar, a file that
// can't be deleted, an unreadable log) is reported where it happens instead.
export class ModCheckerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModCheckerError";
  }
}

export class ModsFolderNotFoundError extends ModCheckerError {
  readonly modsDir: string | null;

  constructor(modsDir: string | null) {
    super(
      modsDir
        ? `Mods folder not found: ${modsDir}`
        : "Minecraft folder not found! Please specify path manually."
    );
    this.name = "ModsFolderNotFoundError";
    this.modsDir = modsDir;
  }
}

export class ConfigError extends ModCheckerError {
  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Invalid config ${filePath}: ${detail}`, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}
