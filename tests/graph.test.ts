/**
 * Graph builder tests
 * Compile-time validation and edge resolution
 */

import { describe, it, expect } from '@jest/globals';
import {
  END,
  FlowGraphBuilder,
  GraphValidationError,
  NoRouteMatchedError,
  NodeContractViolationError,
  START,
} from '../src';
import { buildSupportGraph, supportSchema } from './support/flows';

function issuesOf(build: () => unknown): readonly string[] {
  try {
    build();
  } catch (error) {
    if (error instanceof GraphValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected the graph to be rejected');
}

const noop = () => ({});

describe('FlowGraphBuilder', () => {
  describe('Compilation', () => {
    it('should compile a valid graph', () => {
      const graph = buildSupportGraph();

      expect(graph.id).toBe('support');
      expect(graph.entry).toBe('classify');
      expect(graph.nodeIds).toEqual(['classify', 'respond', 'escalate']);
      expect(graph.isTerminal('respond')).toBe(true);
      expect(graph.isTerminal('classify')).toBe(false);
    });

    it('should freeze the compiled graph', () => {
      expect(Object.isFrozen(buildSupportGraph())).toBe(true);
    });

    it('should reject duplicate and reserved node ids', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop, { terminal: true })
          .addTransform('a', noop, { terminal: true })
          .addTransform(END, noop, { terminal: true })
          .addEdge(START, 'a')
          .compile({ id: 'dupes' })
      );

      expect(issues).toEqual(['duplicate node "a"', `node id "${END}" is reserved`]);
    });

    it('should require exactly one entry edge', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop, { terminal: true })
          .compile({ id: 'no-entry' })
      );

      expect(issues).toContain(`expected exactly one edge from ${START}, found 0`);
    });

    it('should reject edges to undefined nodes', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop)
          .addEdge(START, 'a')
          .addEdge('a', 'missing')
          .compile({ id: 'dangling' })
      );

      expect(issues).toEqual(['edge a -> missing targets an undefined node']);
    });

    it('should reject non-terminal nodes without outgoing edges', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop)
          .addEdge(START, 'a')
          .compile({ id: 'dead-end' })
      );

      expect(issues).toEqual(['node "a" is not terminal and has no outgoing edges']);
    });

    it('should reject terminal nodes with outgoing edges', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop, { terminal: true })
          .addTransform('b', noop, { terminal: true })
          .addEdge(START, 'a')
          .addEdge('a', 'b')
          .compile({ id: 'terminal-edges' })
      );

      expect(issues).toEqual(['terminal node "a" has outgoing edges']);
    });

    it('should reject more than one unconditional edge from a node', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop)
          .addTransform('b', noop, { terminal: true })
          .addTransform('c', noop, { terminal: true })
          .addEdge(START, 'a')
          .addEdge('a', 'b')
          .addEdge('a', 'c')
          .compile({ id: 'fork' })
      );

      expect(issues).toEqual(['node "a" has more than one unconditional edge']);
    });

    it('should reject unreachable nodes', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop, { terminal: true })
          .addTransform('orphan', noop, { terminal: true })
          .addEdge(START, 'a')
          .compile({ id: 'orphans' })
      );

      expect(issues).toEqual(['node "orphan" is unreachable from "a"']);
    });

    it('should count goto targets as reachable', () => {
      const graph = new FlowGraphBuilder(supportSchema)
        .addTransform('a', noop, { ends: ['b'] })
        .addTransform('b', noop, { terminal: true })
        .addEdge(START, 'a')
        .compile({ id: 'goto-only' });

      expect(graph.nodeIds).toEqual(['a', 'b']);
    });

    it('should reject interruptAfter naming unknown nodes', () => {
      const issues = issuesOf(() => buildSupportGraph({ interruptAfter: ['nowhere'] }));
      expect(issues).toEqual(['interruptAfter names undefined node "nowhere"']);
    });

    it('should reject a router without edges', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addRouter('pick')
          .addEdge(START, 'pick')
          .compile({ id: 'lonely-router' })
      );

      expect(issues).toContain('router "pick" has no outgoing edges');
    });

    it('should reject an invalid step budget', () => {
      const issues = issuesOf(() =>
        new FlowGraphBuilder(supportSchema)
          .addTransform('a', noop, { terminal: true })
          .addEdge(START, 'a')
          .compile({ id: 'budget', maxSteps: 0 })
      );

      expect(issues).toEqual(['maxSteps must be a positive integer, got 0']);
    });
  });

  describe('Routing', () => {
    const graph = buildSupportGraph();
    const base = supportSchema.createInitialState();

    it('should take the first satisfied guard', () => {
      expect(graph.resolveNext('classify', { ...base, intent: 'faq' })).toBe('respond');
    });

    it('should fall back to the unconditional edge', () => {
      expect(graph.resolveNext('classify', { ...base, intent: 'other' })).toBe('escalate');
    });

    it('should raise NoRouteMatched when nothing matches', () => {
      const guarded = new FlowGraphBuilder(supportSchema)
        .addTransform('a', noop)
        .addTransform('b', noop, { terminal: true })
        .addEdge(START, 'a')
        .addEdge('a', 'b', (state) => state.intent === 'faq')
        .compile({ id: 'guarded' });

      expect(() => guarded.resolveNext('a', base)).toThrow(NoRouteMatchedError);
    });

    it('should evaluate guards in declaration order', () => {
      const ordered = new FlowGraphBuilder(supportSchema)
        .addTransform('a', noop)
        .addTransform('first', noop, { terminal: true })
        .addTransform('second', noop, { terminal: true })
        .addEdge(START, 'a')
        .addEdge('a', 'first', (state) => state.text.length > 0)
        .addEdge('a', 'second', (state) => state.text.length > 0)
        .compile({ id: 'ordered' });

      expect(ordered.resolveNext('a', { ...base, text: 'hello' })).toBe('first');
    });

    it('should turn a throwing guard into a contract violation', () => {
      const broken = new FlowGraphBuilder(supportSchema)
        .addTransform('a', noop)
        .addTransform('b', noop, { terminal: true })
        .addEdge(START, 'a')
        .addEdge('a', 'b', () => {
          throw new Error('guard exploded');
        })
        .compile({ id: 'broken' });

      expect(() => broken.resolveNext('a', base)).toThrow(NodeContractViolationError);
    });

    it('should narrow candidates to those with a satisfied edge', () => {
      expect(
        graph.resolveCandidates('classify', ['respond', 'escalate'], { ...base, intent: 'other' })
      ).toBe('escalate');
      expect(
        graph.resolveCandidates('classify', ['respond', 'escalate'], { ...base, intent: 'faq' })
      ).toBe('respond');
    });

    it('should only accept declared goto targets', () => {
      expect(graph.resolveGoto('classify', 'respond')).toBe('respond');
      expect(() => graph.resolveGoto('classify', 'classify')).toThrow(NoRouteMatchedError);
    });
  });
});
