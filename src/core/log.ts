const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

/** Where progress lines go. Commands print through this so tests can record them. */
export interface Log {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLog: Log = {
  info: (message) => console.log(`${DIM}${message}${RESET}`),
  success: (message) => console.log(`${GREEN}${message}${RESET}`),
  warn: (message) => console.warn(`${YELLOW}${message}${RESET}`),
  error: (message) => console.error(`${RED}${message}${RESET}`),
};
