import { createInterface } from "node:readline/promises";
import type { TrustPrompt } from "../manifest/manifest-source.js";
import type { Output } from "../output/output.js";

const SHOW_ANSWERS = new Set(["show", "s", "view"]);
const YES_ANSWERS = new Set(["y", "yes"]);

/**
 * Ask on the terminal whether to trust a manifest. `show` prints the raw
 * YAML and asks again; anything but yes declines.
 */
export function terminalTrustPrompt(
  output: Output,
  input: NodeJS.ReadableStream = process.stdin,
  answers: NodeJS.WritableStream = process.stdout,
): TrustPrompt {
  return async (fetched) => {
    output.manifestInfo(fetched);
    output.warning("This manifest has not been accepted before.");
    output.warning("Review the information above and decide whether to trust it.");

    const rl = createInterface({ input, output: answers });
    try {
      for (;;) {
        const answer = (await rl.question("Accept this manifest? [y/N/show]: ")).trim().toLowerCase();
        if (SHOW_ANSWERS.has(answer)) {
          output.manifestYaml(fetched.text);
          continue;
        }
        return YES_ANSWERS.has(answer);
      }
    } finally {
      rl.close();
    }
  };
}
