import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";

/**
 * Asks for a secret without echoing it. The answer is returned as typed;
 * callers trim and validate.
 */
export async function promptSecret(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string> {
  output.write(question);
  const muted = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  const rl = createInterface({ input, output: muted, terminal: true });
  try {
    return await rl.question("");
  } finally {
    rl.close();
    output.write("\n");
  }
}
