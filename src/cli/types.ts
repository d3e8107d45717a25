/**
 * CLI command shape. `usage` and `examples` feed `cgr <command> --help`.
 */

export interface Command {
  name: string;
  description: string;
  usage: string;
  examples?: string[];
  /** Receives the arguments after the command name */
  handler: (args: string[]) => Promise<void>;
}
