import readline from "node:readline/promises";

export type LogSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type Logger = {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
};

export type ConfirmFn = (question: string) => Promise<boolean>;

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export function createLogger(opts: { verbose?: boolean; sink?: LogSink } = {}): Logger {
  const sink = opts.sink ?? consoleSink;
  return {
    info: (msg) => sink.out(msg),
    success: (msg) => sink.out(`✔ ${msg}`),
    warn: (msg) => sink.err(`⚠ ${msg}`),
    error: (msg) => sink.err(`✖ ${msg}`),
    debug: (msg) => {
      if (opts.verbose) sink.out(`◌ ${msg}`);
    }
  };
}

export function isYes(answer: string): boolean {
  return answer.trim().toLowerCase() === "y";
}

// Terminal yes/no prompt; anything but "y" declines.
export const promptYesNo: ConfirmFn = async (question) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isYes(await rl.question(`? ${question} [y/n]: `));
  } finally {
    rl.close();
  }
};
