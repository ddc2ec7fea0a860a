/** Sink for server log lines; the entry point routes it to the LSP console. */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
