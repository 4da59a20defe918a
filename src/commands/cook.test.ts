/**
 * Tests for the cook command
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EventEmitter } from 'events';
import { ScriptedDecisionSource } from '../../tests/fixtures/scripted-decision-source';
import { createOutputCapture, OutputCapture } from '../../tests/utils/output-capture';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';
import { DEFAULT_ARGS, ParsedArgs } from '../cli/types';
import { createBufferLogger } from '../logging/buffer-logger';
import { ExitCode } from '../types/exit-codes';
import type { Prompter, PrompterError, Question } from '../types/prompter';
import { createPrompterError } from '../types/prompter';
import { err, ok, Result } from '../types/result';
import { argsToCliFlags, CookDependencies, runCook } from './cook';

class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answer: Result<string, PrompterError>) {}

  async ask(question: Question): Promise<Result<string, PrompterError>> {
    this.questions.push(question.message);
    return this.answer;
  }

  canPrompt(): boolean {
    return true;
  }
}

describe('runCook', () => {
  let temp: TempDirContext;
  let stdout: OutputCapture;
  let stderr: OutputCapture;

  beforeEach(() => {
    temp = createTempDirContext();
    temp.writeJson('.chef/config.json', { msPerCostUnit: 0, maxDelayMs: 0, pollIntervalMs: 5 });
    stdout = createOutputCapture();
    stderr = createOutputCapture();
  });

  afterEach(() => {
    temp.cleanup();
  });

  function cook(args: Partial<ParsedArgs>, deps: CookDependencies = {}): Promise<ExitCode> {
    return runCook(
      { ...DEFAULT_ARGS, noInteractive: true, ...args },
      {
        cwd: temp.path,
        env: {},
        stdout: stdout.stream,
        stderr: stderr.stream,
        isTTY: false,
        signals: new EventEmitter(),
        ...deps,
        kitchen: { logger: createBufferLogger(), ...deps.kitchen },
      }
    );
  }

  it('should cook a recipe offline and print the summary', async () => {
    const code = await cook({ recipe: 'Pasta', offline: true });

    expect(code).toBe(ExitCode.SUCCESS);
    const lines = stdout.lines();
    expect(lines[0]).toBe('> Planning Pasta...');
    expect(lines).toContain('✔ Plan for Pasta (fallback, 4 steps)');
    expect(lines).toContain(
      '✔ Step 1: Boil pasta in salted water - Saucepan with Pasta, Salt, Water'
    );
    expect(lines).toContain('✔ Step 4: Serve with cheese - Spatula with Parmesan Cheese, Mozzarella Cheese');
    expect(lines.slice(-4)).toEqual([
      'Cooked Pasta using Saucepan, Chopping Board, Mixing Bowl, Spatula',
      '  Steps: 4 succeeded, 0 failed, 0 skipped',
      '  Tool sequence: Saucepan -> Chopping Board -> Mixing Bowl -> Spatula',
      '  Plan source: fallback',
    ]);
    expect(stderr.text()).toBe('');
  });

  it('should report injected failures and still finish', async () => {
    const code = await cook({ recipe: 'French Toast', failSteps: [1] });

    expect(code).toBe(ExitCode.SUCCESS);
    expect(stdout.lines()).toContain(
      '✖ Step 2: Dip bread slices in mixture - Mixing Bowl with Breadcrumbs, Flour, Eggs: ' +
        'Mixing Bowl failed for: Dip bread slices in mixture (injected failure at step 2)'
    );
  });

  it('should print only the final snapshot as JSON', async () => {
    const code = await cook({ recipe: 'Toast', jsonOutput: true });

    expect(code).toBe(ExitCode.SUCCESS);
    const parsed: unknown = JSON.parse(stdout.text());
    expect(parsed).toMatchObject({ recipe: 'Toast', phase: 'DONE', totalSteps: 4, finishedSteps: 4 });
  });

  it('should fail with a usage error when no recipe is given without prompts', async () => {
    expect(await cook({})).toBe(ExitCode.USAGE_ERROR);
    expect(stderr.text()).toBe('Error: No recipe given\n');
  });

  it('should warn about ignored config values through the injected logger', async () => {
    const configPath = temp.writeJson('.chef/config.json', { msPerCostUnit: 'slow', bogus: 1 });
    const logger = createBufferLogger();

    const code = await cook({}, { env: { CHEF_DECISION_TIMEOUT_MS: 'abc' }, kitchen: { logger } });

    expect(code).toBe(ExitCode.USAGE_ERROR);
    expect(logger.getEventsByLevel('warn').map((event) => event.message)).toEqual([
      `Ignoring invalid config file ${configPath}`,
      'Ignoring CHEF_DECISION_TIMEOUT_MS="abc": expected a positive integer',
    ]);
  });

  it('should write config warnings to stderr by default', async () => {
    const configPath = temp.writeJson('.chef/config.json', { msPerCostUnit: 'slow' });

    const code = await runCook(
      { ...DEFAULT_ARGS, noInteractive: true },
      {
        cwd: temp.path,
        env: { CHEF_DECISION_TIMEOUT_MS: 'abc' },
        stdout: stdout.stream,
        stderr: stderr.stream,
        isTTY: false,
        signals: new EventEmitter(),
      }
    );

    expect(code).toBe(ExitCode.USAGE_ERROR);
    expect(stderr.lines()).toEqual([
      `WARN  Ignoring invalid config file ${configPath}`,
      'WARN  Ignoring CHEF_DECISION_TIMEOUT_MS="abc": expected a positive integer',
      'Error: No recipe given',
    ]);
  });

  it('should return as soon as the run ends rather than after the poll interval', async () => {
    const code = await cook({ recipe: 'Toast', offline: true, pollIntervalMs: 60_000 });

    expect(code).toBe(ExitCode.SUCCESS);
    expect(stdout.lines().slice(-1)).toEqual(['  Plan source: fallback']);
  });

  it('should ask for the recipe when prompts are allowed', async () => {
    const prompter = new ScriptedPrompter(ok('Toast'));

    const code = await cook({ noInteractive: false, jsonOutput: true }, { prompter });

    expect(code).toBe(ExitCode.SUCCESS);
    expect(prompter.questions).toEqual(['What would you like to cook?']);
  });

  it('should exit as cancelled when the prompt is cancelled', async () => {
    const prompter = new ScriptedPrompter(err(createPrompterError('CANCELLED')));
    expect(await cook({ noInteractive: false }, { prompter })).toBe(ExitCode.CANCELLED);
    expect(stderr.text()).toBe('Error: Cancelled\n');
  });

  it('should fail with a catalog error when the data directory is empty', async () => {
    const code = await cook({ recipe: 'Toast', dataDirectory: 'missing' });

    expect(code).toBe(ExitCode.CATALOG_ERROR);
    expect(stderr.text()).toMatch(/^Error: Catalog file not found: .*tools\.json\n$/);
  });

  it('should cancel the run on SIGINT', async () => {
    const source = new ScriptedDecisionSource({ plan: ok(['Slice the bread', 'Serve']) });
    const hold = source.holdToolSelection(0);
    const signals = new EventEmitter();

    const pending = cook({ recipe: 'Toast' }, { signals, kitchen: { decisionSource: source } });
    await hold.reached;
    signals.emit('SIGINT');

    expect(await pending).toBe(ExitCode.CANCELLED);
    expect(stdout.lines()).toContain('⚠ Step 1: Slice the bread - Cancelled: Interrupted');
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});

describe('argsToCliFlags', () => {
  it('should leave unset options undefined', () => {
    expect(argsToCliFlags({ ...DEFAULT_ARGS, recipe: 'Toast' })).toEqual({
      offline: undefined,
      failSteps: undefined,
      failTools: undefined,
      timeoutMs: undefined,
      model: undefined,
      pollIntervalMs: undefined,
      dataDirectory: undefined,
      verbose: false,
      debug: false,
      jsonOutput: false,
      noInteractive: undefined,
    });
  });

  it('should pass set options through', () => {
    const flags = argsToCliFlags({ ...DEFAULT_ARGS, offline: true, timeoutMs: 500, failTools: ['Oven'] });
    expect(flags).toMatchObject({ offline: true, timeoutMs: 500, failTools: ['Oven'] });
  });
});
