/**
 * Where the CLI writes. Defaults to the console; tests pass a recorder.
 */

export type Output = {
  log(line: string): void
  error(line: string): void
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
}
