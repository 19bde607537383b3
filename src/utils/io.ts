/**
 * Console sink for user-facing progress lines.
 *
 * Commands print through a MaintIO so tests can capture the exact lines
 * instead of spying on console.
 */

const COLORS = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  BLUE: "\x1b[0;34m",
  NC: "\x1b[0m",
};

export interface MaintIO {
  print: (msg: string) => void;
  info?: (msg: string) => void;
  warn?: (msg: string) => void;
  error?: (msg: string) => void;
  success?: (msg: string) => void;
}

export function createDefaultIO(opts?: { color?: boolean }): MaintIO {
  const color = opts?.color ?? Boolean(process.stdout.isTTY);
  const paint = (code: string, mark: string) => (color ? `${code}${mark}${COLORS.NC}` : mark);

  return {
    print: (msg) => console.log(msg),
    info: (msg) => console.log(`${paint(COLORS.BLUE, "i")} ${msg}`),
    warn: (msg) => console.log(`${paint(COLORS.YELLOW, "!")} ${msg}`),
    error: (msg) => console.log(`${paint(COLORS.RED, "x")} ${msg}`),
    success: (msg) => console.log(`${paint(COLORS.GREEN, "✓")} ${msg}`),
  };
}

/** Routes to the optional channel when the sink has one, else plain print. */
export function emit(
  io: MaintIO,
  level: "info" | "warn" | "error" | "success",
  msg: string,
): void {
  const fn = io[level];
  if (fn) {
    fn(msg);
    return;
  }
  io.print(msg);
}
