/** Where transcript and relay text is rendered. */
export interface ConsoleWriter {
  write(text: string): void;
}

export const stdoutWriter: ConsoleWriter = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

/** Spaces needed to blank out the tail of a previously printed, longer line. */
export function overwritePadding(previousLength: number, nextLength: number): number {
  return Math.max(0, previousLength - nextLength);
}
