import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { ComposeIo } from "../core/compose-session.js";

// =============================================================================
// CONSOLE IO
// =============================================================================

export class ConsoleComposeIo implements ComposeIo {
  private rl = createInterface({ input, output });

  note(message: string): void {
    console.log(message);
  }

  async ask(question: string): Promise<string> {
    const prompt = question.trim().endsWith("?") ? question.trim() : `${question.trim()}?`;
    const answer = await this.rl.question(`${prompt} `);
    return answer.trim();
  }

  close(): void {
    this.rl.close();
  }
}
