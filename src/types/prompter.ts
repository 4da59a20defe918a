/**
 * Asking the user for a missing recipe. The cook command only prompts when
 * no recipe was given and the session is interactive.
 */

import type { Result } from './result';

export interface Question {
  message: string;
  default?: string;
  /** true to accept, or the text to show before asking again */
  validate?: (answer: string) => true | string;
}

export type PrompterErrorCode =
  /** Ctrl+C or Escape while the question was open */
  | 'CANCELLED'
  /** No terminal to ask on */
  | 'UNAVAILABLE'
  | 'FAILED';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

export interface Prompter {
  canPrompt(): boolean;
  ask(question: Question): Promise<Result<string, PrompterError>>;
}

const FALLBACK_MESSAGES: Record<PrompterErrorCode, string> = {
  CANCELLED: 'Prompt cancelled',
  UNAVAILABLE: 'No terminal available for prompting',
  FAILED: 'Prompt failed',
};

export function createPrompterError(
  code: PrompterErrorCode,
  message: string = FALLBACK_MESSAGES[code],
  cause?: Error
): PrompterError {
  return { code, message, cause };
}
