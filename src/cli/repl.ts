/**
 * Read-eval-print loop.
 * Reads one line at a time, dispatches it and writes the result before
 * reading the next. Ends on an exit command or when the input closes.
 */

import { createInterface } from 'node:readline';
import type { Dispatch } from '../commands/router.js';

export const DEFAULT_PROMPT = 'Enter command: ';

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  dispatch: Dispatch;
  prompt?: string;
  /** Clock for each command. Default: wall clock. */
  clock?: () => Date;
}

export async function runRepl(options: ReplOptions): Promise<void> {
  const clock = options.clock ?? (() => new Date());
  const rl = createInterface({
    input: options.input,
    output: options.output,
    terminal: false,
  });
  rl.setPrompt(options.prompt ?? DEFAULT_PROMPT);

  try {
    rl.prompt();
    for await (const line of rl) {
      const result = options.dispatch(line, { now: clock() });
      if (result.output.length > 0) {
        options.output.write(`${result.output}\n`);
      }
      if (result.status === 'exit') break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
