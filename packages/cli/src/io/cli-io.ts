/** Where a widefmt invocation writes its output and how it ends. */
export interface CliIo {
  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  /** Whether stderr is a terminal; the human-readable logger only writes to one. */
  readonly stderrIsTerminal: boolean;
  exit(code: number): never;
}
