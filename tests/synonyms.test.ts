import { describe, it, expect } from '@jest/globals';
import { buildVariantList, expandSynonyms } from '../src/pipeline/synonyms';
import { MemoryKeyValueStore } from '../src/utils/cache';
import { silentLogger } from '../src/utils/logger';
import { routeByAgent, ScriptedGenerator, TEST_AGENT_CONFIG } from './helpers/fakeGenerator';

function contextFor(generator: ScriptedGenerator) {
  return { generator, config: TEST_AGENT_CONFIG, logger: silentLogger };
}

describe('buildVariantList', () => {
  const generated = ['GNN', 'Graph Neural Network', 'message passing network (MPNN)', 'gnn'];

  it('puts the keyword first and splits parenthetical aliases', () => {
    expect(buildVariantList('graph neural network', generated, 10)).toEqual([
      'graph neural network',
      'gnn',
      'message passing network',
      'mpnn',
    ]);
  });

  it('caps the number of variants', () => {
    expect(buildVariantList('graph neural network', generated, 2)).toEqual([
      'graph neural network',
      'gnn',
      'message passing network',
    ]);
  });
});

describe('expandSynonyms', () => {
  it('degrades a failed keyword to itself without affecting the others', async () => {
    const generator = new ScriptedGenerator(
      routeByAgent({
        synonyms: (keyword) =>
          keyword === 'graph generation'
            ? JSON.stringify({ synonyms: ['Molecular Graph Synthesis'] })
            : new Error('service error'),
      })
    );

    const synonyms = await expandSynonyms(
      ['graph generation', 'drug discovery'],
      { maxSynonyms: 10 },
      contextFor(generator)
    );

    expect(synonyms).toEqual({
      'graph generation': ['graph generation', 'molecular graph synthesis'],
      'drug discovery': ['drug discovery'],
    });
  });

  it('makes no calls when no variants are wanted', async () => {
    const generator = new ScriptedGenerator(() => new Error('should not be called'));

    const synonyms = await expandSynonyms(['graph generation'], { maxSynonyms: 0 }, contextFor(generator));

    expect(synonyms).toEqual({ 'graph generation': ['graph generation'] });
    expect(generator.prompts).toHaveLength(0);
  });

  it('reuses cached synonym sets', async () => {
    const cache = new MemoryKeyValueStore();
    const generator = new ScriptedGenerator(() => JSON.stringify({ synonyms: ['gnn'] }));

    const first = await expandSynonyms(['graph neural network'], { maxSynonyms: 5, cache }, contextFor(generator));
    const second = await expandSynonyms(['graph neural network'], { maxSynonyms: 5, cache }, contextFor(generator));

    expect(second).toEqual(first);
    expect(generator.prompts).toHaveLength(1);
  });
});
