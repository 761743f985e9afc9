import pc from "picocolors";

export function shouldDisableColor(env: NodeJS.ProcessEnv = process.env): boolean {
  if ("NO_COLOR" in env) {
    return true;
  }

  const flag = env.MIGRAKIT_NO_COLOR;
  if (flag === undefined) {
    return false;
  }

  const normalized = flag.trim().toLowerCase();
  return normalized === "" || normalized === "1" || normalized === "true" || normalized === "yes";
}

const isColorSupported = Boolean(process.stdout?.isTTY) && !shouldDisableColor();

type ColorFn = (input: string) => string;

const magentaStrong: ColorFn = (input: string) => pc.bold(pc.magenta(input));
const dimNote: ColorFn = (input: string) => pc.dim(input);

function paint(color: ColorFn, message: string): string {
  return isColorSupported ? color(message) : message;
}

function output(stream: "log" | "warn" | "error", message: string): void {
  // eslint-disable-next-line no-console
  console[stream](message);
}

export const logger = {
  action(message: string): void {
    output("log", paint(magentaStrong, `▶ ${message}`));
  },

  info(message: string): void {
    output("log", paint(pc.cyan, message));
  },

  success(message: string): void {
    output("log", paint(pc.green, message));
  },

  warn(message: string): void {
    const formatted = message.startsWith("⚠") ? message : `⚠ ${message}`;
    output("warn", paint(pc.yellow, formatted));
  },

  error(message: string): void {
    output("error", paint(pc.red, message));
  },

  note(message: string): void {
    output("log", paint(dimNote, message));
  }
};

export function formatPath(message: string): string {
  return paint(pc.magenta, message);
}
