/**
 * Remote decision source backed by an OpenAI-compatible chat-completions API
 */

import OpenAI from 'openai';
import { ingredientNames, toolNames } from '../catalog/catalog-provider';
import {
  getIngredientSelectionTemplate,
  getPlanTemplate,
  getToolSelectionTemplate,
  interpolateTemplate,
} from '../templates';
import { createDecisionSourceError, describeError } from '../types/errors';
import { err, ok } from '../types/result';
import type {
  DecisionResult,
  DecisionSource,
  IngredientSelectionRequest,
  PlanRequest,
  ToolSelectionRequest,
} from './decision-source';
import { parseIngredientAnswer, parsePlanText, parseToolAnswer } from './response-parsing';

/**
 * A single-prompt completion request
 */
export interface CompletionRequest {
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Narrow seam over the chat-completions client.
 * Resolves with the message text (null when the model returned none) and
 * rejects on transport or API errors.
 */
export interface CompletionClient {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string | null>;
}

export interface OpenAICompletionClientOptions {
  apiKey: string;
  baseUrl?: string;
}

/**
 * CompletionClient over the official openai package
 */
export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(options: OpenAICompletionClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      // Retries would outlive the decision timeout; the fallback covers failures
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string | null> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [{ role: 'user', content: request.prompt }],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      { signal }
    );
    return response.choices[0]?.message.content ?? null;
  }
}

export interface RemoteDecisionSourceOptions {
  planModel: string;
  selectionModel: string;
}

function describeSteps(steps: readonly { ordinal: number; description: string }[]): string {
  if (steps.length === 0) {
    return 'none';
  }
  return steps.map((step) => `Step ${step.ordinal + 1}: ${step.description}`).join('; ');
}

export class RemoteDecisionSource implements DecisionSource {
  readonly name = 'openai';

  constructor(
    private readonly client: CompletionClient,
    private readonly options: RemoteDecisionSourceOptions
  ) {}

  async proposePlan(request: PlanRequest, signal: AbortSignal): Promise<DecisionResult<string[]>> {
    const prompt = interpolateTemplate(getPlanTemplate(), {
      recipe: request.recipe,
      tools: toolNames(request.catalog).join(', '),
      ingredients: ingredientNames(request.catalog).join(', '),
      maxSteps: String(request.maxSteps),
    });

    const text = await this.complete(
      { model: this.options.planModel, prompt, maxTokens: 500, temperature: 0.7 },
      signal
    );
    if (!text.ok) {
      return text;
    }

    const steps = parsePlanText(text.value);
    if (steps.length === 0) {
      return err(createDecisionSourceError('INVALID_RESPONSE', 'Plan response contained no steps'));
    }
    return ok(steps);
  }

  async selectTool(request: ToolSelectionRequest, signal: AbortSignal): Promise<DecisionResult<string>> {
    const tools = toolNames(request.catalog);
    const prompt = interpolateTemplate(getToolSelectionTemplate(), {
      recipe: request.recipe,
      step: request.step.description,
      tools: tools.join(', '),
    });

    const text = await this.complete(
      { model: this.options.selectionModel, prompt, maxTokens: 50, temperature: 0.3 },
      signal
    );
    if (!text.ok) {
      return text;
    }

    const tool = parseToolAnswer(text.value, tools);
    if (tool === undefined) {
      return err(
        createDecisionSourceError('INVALID_RESPONSE', `Unknown tool "${text.value.trim()}"`)
      );
    }
    return ok(tool);
  }

  async selectIngredients(
    request: IngredientSelectionRequest,
    signal: AbortSignal
  ): Promise<DecisionResult<string[]>> {
    const ingredients = ingredientNames(request.catalog);
    const prompt = interpolateTemplate(getIngredientSelectionTemplate(), {
      recipe: request.recipe,
      step: request.step.description,
      previousSteps: describeSteps(request.previousSteps),
      ingredients: ingredients.join(', '),
    });

    const text = await this.complete(
      { model: this.options.selectionModel, prompt, maxTokens: 100, temperature: 0.3 },
      signal
    );
    if (!text.ok) {
      return text;
    }

    const { accepted, rejected } = parseIngredientAnswer(text.value, ingredients);
    if (accepted.length === 0) {
      const detail = rejected.length > 0 ? `: ${rejected.join(', ')}` : '';
      return err(createDecisionSourceError('INVALID_RESPONSE', `No known ingredients${detail}`));
    }
    return ok(accepted);
  }

  private async complete(
    request: CompletionRequest,
    signal: AbortSignal
  ): Promise<DecisionResult<string>> {
    try {
      const content = await this.client.complete(request, signal);
      if (content === null || content.trim().length === 0) {
        return err(createDecisionSourceError('INVALID_RESPONSE', 'Empty response'));
      }
      return ok(content);
    } catch (error) {
      if (signal.aborted) {
        return err(createDecisionSourceError('TIMEOUT', 'Decision call aborted', error));
      }
      return err(
        createDecisionSourceError(
          'UNAVAILABLE',
          `Decision service call failed: ${describeError(error)}`,
          error
        )
      );
    }
  }
}
