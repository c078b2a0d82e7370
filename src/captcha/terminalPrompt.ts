import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { createDiagnosticId } from "../observability";
import type { OperatorPrompt } from "./manualEntry";

export interface TerminalPromptOptions {
  imageDir: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Writes the image next to the other CAPTCHA diagnostics, prints its path and
 * reads one line. Closing the input (Ctrl-D) dismisses the prompt.
 */
export class TerminalPrompt implements OperatorPrompt {
  private readonly imageDir: string;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: TerminalPromptOptions) {
    this.imageDir = path.resolve(options.imageDir, "manual");
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async ask(image: Buffer): Promise<string | undefined> {
    await fs.promises.mkdir(this.imageDir, { recursive: true });
    const imagePath = path.join(this.imageDir, `captcha_${createDiagnosticId()}.png`);
    await fs.promises.writeFile(imagePath, image);

    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      return await new Promise<string | undefined>((resolve, reject) => {
        rl.once("close", () => resolve(undefined));
        rl.question(`CAPTCHA image saved to ${imagePath}\nType the characters shown: `).then(resolve, reject);
      });
    } finally {
      rl.close();
    }
  }
}
