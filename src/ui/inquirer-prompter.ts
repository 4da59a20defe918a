/**
 * Terminal prompts through inquirer
 */

import inquirer from 'inquirer';
import { describeError } from '../types/errors';
import type { Prompter, PrompterError, Question } from '../types/prompter';
import { createPrompterError } from '../types/prompter';
import { err, ok, Result } from '../types/result';

export interface InquirerPrompterConfig {
  /** False under --no-interactive */
  interactive: boolean;
  isTTY: boolean;
}

// inquirer 8 rejects with this message when the readline is closed by Ctrl+C
function isForcedClose(error: unknown): boolean {
  return error instanceof Error && /force closed|cancel/i.test(error.message);
}

export class InquirerPrompter implements Prompter {
  constructor(private readonly config: InquirerPrompterConfig) {}

  canPrompt(): boolean {
    return this.config.interactive && this.config.isTTY;
  }

  async ask(question: Question): Promise<Result<string, PrompterError>> {
    if (!this.canPrompt()) {
      return question.default === undefined
        ? err(createPrompterError('UNAVAILABLE'))
        : ok(question.default);
    }

    try {
      const { answer } = await inquirer.prompt<{ answer: string }>([
        { type: 'input', name: 'answer', ...question },
      ]);
      return ok(answer);
    } catch (error) {
      return isForcedClose(error)
        ? err(createPrompterError('CANCELLED'))
        : err(
            createPrompterError(
              'FAILED',
              `Prompt failed: ${describeError(error)}`,
              error instanceof Error ? error : undefined
            )
          );
    }
  }
}

export function createInquirerPrompter(interactive: boolean): Prompter {
  return new InquirerPrompter({ interactive, isTTY: process.stdout.isTTY ?? false });
}
