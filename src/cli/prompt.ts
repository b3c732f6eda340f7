import { createInterface } from "readline";
import type { Readable, Writable } from "stream";

type Input = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/**
 * Print `message` and wait for the user. On a terminal any key will do;
 * piped input needs a full line (or EOF).
 */
export function waitForKeypress(
  message: string,
  input: Input = process.stdin,
  output: Writable = process.stdout,
): Promise<void> {
  const setRawMode = input.setRawMode?.bind(input);

  if (!input.isTTY || !setRawMode) {
    return new Promise((resolve) => {
      const rl = createInterface({ input, output });
      rl.once("close", () => resolve());
      rl.question(message, () => {
        rl.close();
      });
    });
  }

  return new Promise((resolve) => {
    output.write(message);
    setRawMode(true);
    // a hangup ends the input without a keypress
    const done = () => {
      input.off("data", done);
      input.off("end", done);
      setRawMode(false);
      input.pause();
      output.write("\n");
      resolve();
    };
    input.once("data", done);
    input.once("end", done);
    input.resume();
  });
}
