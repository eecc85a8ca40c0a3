/**
 * Terminal prompts for the setup command. Answers to secret questions are
 * not echoed.
 */

import { Writable } from 'stream';
import { createInterface } from 'readline/promises';

export interface PromptOptions {
  /** Hide what the user types */
  secret?: boolean;
}

export interface Prompter {
  prompt: (question: string, options?: PromptOptions) => Promise<string>;
  close: () => void;
}

/**
 * @param terminal - whether input is a TTY; readline only echoes keystrokes in terminal mode
 */
export function createPrompter(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  terminal: boolean,
): Prompter {
  let muted = false;

  // Everything readline writes goes through here, so echo can be switched off
  const gate = new Writable({
    write(chunk: string | Uint8Array, _encoding, callback) {
      if (!muted) output.write(chunk);
      callback();
    },
  });

  const rl = createInterface({ input, output: gate, terminal });

  return {
    prompt: async (question, options = {}) => {
      if (!options.secret) {
        return rl.question(question);
      }

      output.write(question);
      muted = true;
      try {
        return await rl.question('');
      } finally {
        muted = false;
        output.write('\n');
      }
    },
    close: () => rl.close(),
  };
}
