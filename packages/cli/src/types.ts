/**
 * Options every command accepts
 */
export interface GlobalOptions {
  verbose?: boolean | undefined;
  json?: boolean | undefined;
}

/**
 * Where and how a command is running
 */
export interface CommandContext {
  cwd: string;
  options: GlobalOptions;
  isCI: boolean;
  /** True when stdout is a terminal (spinners allowed) */
  isInteractive: boolean;
}
