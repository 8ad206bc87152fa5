import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import { parseCascadeDecision } from "../sentinel/cascade.js";
import {
  CASCADE_DECISIONS,
  type CascadeDecision,
  type CascadeDecisionChannel,
} from "../sentinel/types.js";

// =============================================================================
// IO
// =============================================================================

export interface DecisionIo {
  note(message: string): void;
  ask(question: string): Promise<string>;
}

export class ConsoleDecisionIo implements DecisionIo {
  private rl = createInterface({ input, output });

  note(message: string): void {
    console.log(message);
  }

  async ask(question: string): Promise<string> {
    const answer = await this.rl.question(`${question.trim()} `);
    return answer.trim();
  }

  close(): void {
    this.rl.close();
  }
}

// =============================================================================
// CHANNEL
// =============================================================================

const MAX_ATTEMPTS = 3;

// Asks until the answer names a decision; repeated nonsense resolves to halt.
export class PromptDecisionChannel implements CascadeDecisionChannel {
  constructor(
    private readonly io: DecisionIo,
    private readonly maxAttempts = MAX_ATTEMPTS,
  ) {}

  async choose(prompt: string): Promise<CascadeDecision> {
    this.io.note(prompt);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const answer = await this.io.ask(`Decision [${CASCADE_DECISIONS.join("/")}]:`);
      const decision = parseCascadeDecision(answer);
      if (decision) return decision;
      this.io.note(`Unrecognized decision "${answer}".`);
    }

    this.io.note("No valid decision given; halting the wave.");
    return "halt";
  }
}
