export type LogPhase =
  | "cli"
  | "config"
  | "rasterize"
  | "omr"
  | "combine"
  | "lyrics"
  | "transpose"
  | "render"
  | "progress";

type CodedMessage = { code: string; message: string };

export type Logger = {
  info: (phase: LogPhase, message: string) => void;
  warn: (phase: LogPhase, message: string) => void;
  error: (phase: LogPhase, message: string) => void;
  diagnostics: (phase: LogPhase, diagnostics: CodedMessage[], warnings?: CodedMessage[]) => void;
};

const TAG = "keyshift";

export const createConsoleLogger = (options: { quiet?: boolean } = {}): Logger => {
  const quiet = options.quiet === true;
  return {
    info: (phase, message) => {
      if (quiet) return;
      console.log(`[${TAG}][${phase}] ${message}`);
    },
    warn: (phase, message) => {
      console.warn(`[${TAG}][${phase}] ${message}`);
    },
    error: (phase, message) => {
      console.error(`[${TAG}][${phase}] ${message}`);
    },
    diagnostics: (phase, diagnostics, warnings = []) => {
      for (const d of diagnostics) {
        console.error(`[${TAG}][${phase}][${d.code}] ${d.message}`);
      }
      for (const w of warnings) {
        console.warn(`[${TAG}][${phase}][${w.code}] ${w.message}`);
      }
    },
  };
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  diagnostics: () => undefined,
};
