// Sink for user-facing output; the bin passes console.
export type CliLogger = {
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

export const EXIT_OK = 0;
export const EXIT_REQUEST_FAILED = 1;
export const EXIT_INVALID_INPUT = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_REQUEST_FAILED | typeof EXIT_INVALID_INPUT;
