export type SummarizeLogger = {
  info(message: string): void
  warn(message: string): void
}

export const silentLogger: SummarizeLogger = {
  info: () => {},
  warn: () => {},
}

export function createConsoleLogger(
  options: { quiet?: boolean } = {},
): SummarizeLogger {
  if (options.quiet) {
    return silentLogger
  }
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(`Warning: ${message}`),
  }
}
