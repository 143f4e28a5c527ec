/**
 * Display port interface.
 * Where printed values end up; console in normal use, a buffer under test.
 */
export interface DisplayPort {
  write(line: string): void;
}

export function consoleDisplay(): DisplayPort {
  return {
    write(line: string): void {
      console.log(line);
    },
  };
}

/**
 * Display that keeps every written line.
 */
export type BufferDisplay = DisplayPort & {
  readonly lines: string[];
  text(): string;
  clear(): void;
};

export function bufferDisplay(): BufferDisplay {
  const lines: string[] = [];
  return {
    lines,
    write(line: string): void {
      lines.push(line);
    },
    text(): string {
      return lines.join("\n");
    },
    clear(): void {
      lines.length = 0;
    },
  };
}
