import * as readline from "node:readline";

export interface PromptProvider {
  /** Asks a yes/no question; an empty answer means no. */
  confirm(question: string): Promise<boolean>;
}

export function parseYesNo(answer: string): boolean {
  const trimmed = answer.trim().toLowerCase();
  return trimmed === "y" || trimmed === "yes";
}

export class ReadlinePromptProvider implements PromptProvider {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  confirm(question: string): Promise<boolean> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    return new Promise((resolve) => {
      // Ctrl-C while asking counts as "no" and is passed on to the process handlers.
      rl.on("SIGINT", () => {
        rl.close();
        resolve(false);
        process.kill(process.pid, "SIGINT");
      });
      rl.question(`${question} [y/N] `, (answer) => {
        rl.close();
        resolve(parseYesNo(answer));
      });
    });
  }
}
