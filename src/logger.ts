import chalk from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (text: string) => void;
}

const toStderr = (text: string) => {
  process.stderr.write(text);
};

export const createLogger = ({ verbose = false, write = toStderr }: LoggerOptions = {}): Logger => ({
  debug: message => {
    if (verbose) {
      write(chalk.gray(message) + "\n");
    }
  },
  info: message => write(message + "\n"),
  warn: message => write(chalk.yellow(`Warning: ${message}`) + "\n"),
  error: message => write(chalk.red(`Error: ${message}`) + "\n"),
});

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
