/**
 * JSON graph definition tests
 * Declarative conditions and assembly from a node catalog
 */

import { describe, it, expect } from '@jest/globals';
import {
  GraphValidationError,
  NodeCatalog,
  START,
  assembleGraph,
  evaluateCondition,
  readField,
} from '../src';
import {
  ESCALATE_REPLY,
  FAQ_REPLY,
  SupportStateType,
  createMemoryEngine,
  supportSchema,
} from './support/flows';

const catalog: NodeCatalog<SupportStateType> = {
  transforms: {
    classify: (state) => ({
      intent: /password|reset/i.test(state.text) ? 'faq' : 'other',
      log: ['classify'],
    }),
    respond: () => ({ reply: FAQ_REPLY, log: ['respond'] }),
    escalate: () => ({ reply: ESCALATE_REPLY, log: ['escalate'] }),
  },
};

const definition = {
  id: 'support-json',
  nodes: [
    { id: 'classify', kind: 'transform' },
    { id: 'respond', kind: 'transform', terminal: true },
    { id: 'handoff', kind: 'transform', behavior: 'escalate', terminal: true },
  ],
  edges: [
    { from: START, to: 'classify' },
    {
      from: 'classify',
      to: {
        conditions: [{ field: 'intent', operator: 'equals', value: 'faq', goto: 'respond' }],
        default: 'handoff',
      },
    },
  ],
};

function issuesOf(build: () => unknown): readonly string[] {
  try {
    build();
  } catch (error) {
    if (error instanceof GraphValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected the definition to be rejected');
}

describe('Graph definitions', () => {
  describe('Conditions', () => {
    const state = {
      text: 'Reset my password',
      intent: 'faq',
      score: 7,
      tags: ['vip', 'eu'],
      profile: { tier: 'gold' },
    };

    it('should read dot paths and miss quietly', () => {
      expect(readField(state, 'profile.tier')).toBe('gold');
      expect(readField(state, 'profile.region')).toBeUndefined();
      expect(readField(state, 'text.length.value')).toBeUndefined();
    });

    it('should compare equality and order', () => {
      expect(evaluateCondition({ field: 'intent', operator: 'equals', value: 'faq' }, state)).toBe(true);
      expect(evaluateCondition({ field: 'intent', operator: 'not_equals', value: 'faq' }, state)).toBe(false);
      expect(evaluateCondition({ field: 'score', operator: 'gt', value: 7 }, state)).toBe(false);
      expect(evaluateCondition({ field: 'score', operator: 'gte', value: 7 }, state)).toBe(true);
      expect(evaluateCondition({ field: 'score', operator: 'lt', value: 10 }, state)).toBe(true);
      expect(evaluateCondition({ field: 'score', operator: 'lte', value: 6 }, state)).toBe(false);
      expect(evaluateCondition({ field: 'score', operator: 'gt', value: '5' }, state)).toBe(false);
    });

    it('should compare structured values by content', () => {
      expect(
        evaluateCondition({ field: 'tags', operator: 'equals', value: ['vip', 'eu'] }, state)
      ).toBe(true);
    });

    it('should test membership in strings and lists', () => {
      expect(evaluateCondition({ field: 'text', operator: 'contains', value: 'password' }, state)).toBe(true);
      expect(evaluateCondition({ field: 'tags', operator: 'contains', value: 'vip' }, state)).toBe(true);
      expect(evaluateCondition({ field: 'tags', operator: 'not_contains', value: 'us' }, state)).toBe(true);
      expect(
        evaluateCondition({ field: 'profile.tier', operator: 'in', value: ['gold', 'platinum'] }, state)
      ).toBe(true);
      expect(evaluateCondition({ field: 'intent', operator: 'not_in', value: ['faq'] }, state)).toBe(false);
    });

    it('should match patterns and presence', () => {
      expect(evaluateCondition({ field: 'text', operator: 'regex', value: '^reset', }, state)).toBe(false);
      expect(evaluateCondition({ field: 'text', operator: 'regex', value: '^Reset' }, state)).toBe(true);
      expect(evaluateCondition({ field: 'reply', operator: 'exists' }, state)).toBe(false);
      expect(evaluateCondition({ field: 'reply', operator: 'exists', value: false }, state)).toBe(true);
    });

    it('should combine conditions with all and any', () => {
      const vipFaq = {
        all: [
          { field: 'intent', operator: 'equals' as const, value: 'faq' },
          {
            any: [
              { field: 'tags', operator: 'contains' as const, value: 'vip' },
              { field: 'score', operator: 'gt' as const, value: 100 },
            ],
          },
        ],
      };

      expect(evaluateCondition(vipFaq, state)).toBe(true);
      expect(evaluateCondition(vipFaq, { ...state, tags: [] })).toBe(false);
    });
  });

  describe('Assembly', () => {
    it('should build a graph that routes on the declared conditions', async () => {
      const graph = assembleGraph(supportSchema, definition, catalog);
      const { engine } = createMemoryEngine();

      const faq = await engine.run('d1', { text: 'forgot my password' }, graph);
      const other = await engine.run('d2', { text: 'billing question' }, graph);

      expect(graph.id).toBe('support-json');
      expect(faq.trace).toEqual(['classify', 'respond']);
      expect(other.trace).toEqual(['classify', 'handoff']);
      expect(other.state.reply).toBe(ESCALATE_REPLY);
    });

    it('should accept definitions that arrive as parsed JSON', () => {
      const graph = assembleGraph(supportSchema, JSON.parse(JSON.stringify(definition)), catalog);
      expect(graph.nodeIds).toEqual(['classify', 'respond', 'handoff']);
    });

    it('should report malformed definitions by path', () => {
      const issues = issuesOf(() =>
        assembleGraph(supportSchema, { id: 'broken', nodes: [{ id: 'a', kind: 'tool' }], edges: [] }, catalog)
      );

      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^nodes\.0\.kind: /);
      expect(issues[1]).toMatch(/^edges: /);
    });

    it('should report behaviors missing from the catalog', () => {
      const issues = issuesOf(() =>
        assembleGraph(supportSchema, definition, { transforms: { classify: () => ({}) } })
      );

      expect(issues).toEqual([
        'node "respond": no transform "respond" in the catalog',
        'node "handoff": no transform "escalate" in the catalog',
      ]);
    });

    it('should check condition fields and values against the state', () => {
      const issues = issuesOf(() =>
        assembleGraph(
          supportSchema,
          {
            ...definition,
            edges: [
              { from: START, to: 'classify' },
              {
                from: 'classify',
                to: {
                  conditions: [
                    { field: 'mood', operator: 'equals', value: 'angry', goto: 'handoff' },
                    { field: 'intent', operator: 'in', value: 'faq', goto: 'respond' },
                    { field: 'text', operator: 'regex', value: 7, goto: 'respond' },
                  ],
                  default: 'handoff',
                },
              },
            ],
          },
          catalog
        )
      );

      expect(issues).toEqual([
        'edge #1 from "classify": condition field "mood" is not part of the state',
        'edge #1 from "classify": in condition needs an array value',
        'edge #1 from "classify": regex condition needs a string pattern',
      ]);
    });

    it('should pass graph-level problems through from compilation', () => {
      const issues = issuesOf(() =>
        assembleGraph(
          supportSchema,
          { ...definition, edges: [{ from: START, to: 'classify' }, { from: 'classify', to: 'respond' }] },
          catalog
        )
      );

      expect(issues).toEqual(['node "handoff" is unreachable from "classify"']);
    });
  });
});
