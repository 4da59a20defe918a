/**
 * Tests for RunRegistry
 */

import { describe, it, expect } from 'vitest';
import { createTestKitchen, createTestConfig } from '../orchestration/kitchen-factory';
import { StaticCatalogProvider } from '../catalog/catalog-provider';
import { exampleCatalog } from '../schemas/catalog.schema';
import { InvalidRecipeError, UnknownRunError } from '../types/errors';
import { generateRunId, RunRegistry } from './run-registry';

function createRegistry(): RunRegistry {
  let next = 0;
  const kitchen = createTestKitchen(
    createTestConfig({ simulation: { msPerCostUnit: 0, maxDelayMs: 0 } }),
    {
      catalogProvider: new StaticCatalogProvider(exampleCatalog.tools, exampleCatalog.ingredients),
      nextRunId: () => `cook-${++next}`,
    }
  );
  return kitchen.registry;
}

describe('RunRegistry', () => {
  it('should start runs under opaque ids', async () => {
    const registry = createRegistry();
    const first = registry.start('Toast');
    const second = registry.start('Pasta');

    expect(first).toBe('cook-1');
    expect(second).toBe('cook-2');
    expect(registry.snapshot(first)?.recipe).toBe('Toast');

    const [toast, pasta] = await Promise.all([
      registry.whenFinished(first),
      registry.whenFinished(second),
    ]);
    expect(toast.phase).toBe('DONE');
    expect(pasta.phase).toBe('DONE');
  });

  it('should trim the recipe name', () => {
    const registry = createRegistry();
    const runId = registry.start('  Toast  ');
    expect(registry.snapshot(runId)?.recipe).toBe('Toast');
    registry.cancelAll();
  });

  it('should reject a blank recipe', () => {
    const registry = createRegistry();
    expect(() => registry.start('   ')).toThrow(InvalidRecipeError);
    expect(registry.list()).toEqual([]);
  });

  it('should return undefined for an unknown run', () => {
    expect(createRegistry().snapshot('cook-missing')).toBeUndefined();
  });

  it('should reject whenFinished for an unknown run', async () => {
    await expect(createRegistry().whenFinished('cook-missing')).rejects.toThrow(UnknownRunError);
  });

  it('should cancel one run without touching another', async () => {
    const registry = createRegistry();
    const cancelled = registry.start('Toast');
    const kept = registry.start('Pasta');

    expect(registry.cancel(cancelled, 'No eggs')).toBe(true);
    expect((await registry.whenFinished(cancelled)).phase).toBe('CANCELLED');
    expect((await registry.whenFinished(kept)).phase).toBe('DONE');
    expect(registry.cancel(kept)).toBe(false);
    expect(registry.cancel('cook-missing')).toBe(false);
  });

  it('should forget a run only after it has ended', async () => {
    const registry = createRegistry();
    const runId = registry.start('Toast');

    expect(registry.forget(runId)).toBe(false);
    await registry.whenFinished(runId);

    expect(registry.forget(runId)).toBe(true);
    expect(registry.snapshot(runId)).toBeUndefined();
    expect(registry.list()).toEqual([]);
    expect(registry.forget(runId)).toBe(false);
    await expect(registry.whenFinished(runId)).rejects.toBeInstanceOf(UnknownRunError);
  });

  it('should list runs with their phases', async () => {
    const registry = createRegistry();
    const runId = registry.start('Toast');
    await registry.whenFinished(runId);
    expect(registry.list()).toEqual([{ runId, recipe: 'Toast', phase: 'DONE' }]);
  });

  it('should cancel every unfinished run', async () => {
    const registry = createRegistry();
    const ids = [registry.start('Toast'), registry.start('Pasta')];
    expect(registry.cancelAll('Closing')).toBe(2);
    const finals = await Promise.all(ids.map((id) => registry.whenFinished(id)));
    expect(finals.map((snapshot) => snapshot.phase)).toEqual(['CANCELLED', 'CANCELLED']);
  });
});

describe('generateRunId', () => {
  it('should produce distinct cook- prefixed ids', () => {
    const a = generateRunId();
    const b = generateRunId();
    expect(a).toMatch(/^cook-[0-9a-f-]{36}$/);
    expect(a).not.toBe(b);
  });
});
