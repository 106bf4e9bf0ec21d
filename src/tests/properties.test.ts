/**
 * Property tests for the budgeting invariants
 *
 * - pinned paths stay unique and within capacity
 * - built payloads never exceed maxTokens
 * - conversation order survives filtering
 * - token counting is deterministic
 * - usage tiers follow the thresholds
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import fc from 'fast-check';

import {
  createContextSession,
  appendMessage,
  addFile,
  buildSessionPayloadReport,
  listFiles,
  validateSession,
} from '../session.js';
import { classifyUsage } from '../usage.js';
import { createTiktokenCounter, heuristicCounter } from '../tokens.js';
import { wordCounter } from './fixtures.js';

// ============================================================================
// ARBITRARIES
// ============================================================================

const textArb = fc.array(fc.constantFrom('a', 'bb', 'ccc', 'dddd'), { maxLength: 30 }).map(ws => ws.join(' '));

const pathArb = fc.constantFrom('a.ts', 'b.ts', 'c.ts', 'd.ts', 'e.ts', 'f.ts', 'g.ts');

type Operation =
  | { kind: 'message'; role: 'user' | 'assistant'; content: string }
  | { kind: 'file'; path: string; content: string };

const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constant('message' as const),
    role: fc.constantFrom('user' as const, 'assistant' as const),
    content: textArb,
  }),
  fc.record({
    kind: fc.constant('file' as const),
    path: pathArb,
    content: textArb,
  })
);

function applyAll(maxTokens: number, maxFileContexts: number, operations: Operation[]) {
  const session = createContextSession(
    { systemPrompt: 'sys', maxTokens, maxFileContexts },
    { counter: wordCounter }
  );
  for (const op of operations) {
    if (op.kind === 'message') {
      appendMessage(session, op.role, op.content);
    } else {
      addFile(session, op.path, op.content);
    }
  }
  return session;
}

// ============================================================================
// PROPERTIES
// ============================================================================

describe('Budgeting Properties', () => {
  it('never builds a payload over maxTokens', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 200 }),
      fc.integer({ min: 1, max: 6 }),
      fc.array(operationArb, { maxLength: 40 }),
      fc.option(textArb, { nil: undefined }),
      (maxTokens, maxFiles, operations, extraUser) => {
        const session = applyAll(maxTokens, maxFiles, operations);
        const report = buildSessionPayloadReport(session, extraUser);

        const cost = report.messages.reduce((sum, m) => sum + wordCounter.count(m.content), 0);
        assert.ok(cost <= maxTokens, `cost ${cost} > ${maxTokens}`);
        assert.strictEqual(cost, report.totalTokens);
        assert.strictEqual(report.messages[0].content, 'sys');
      }
    ));
  });

  it('keeps pinned paths unique and within capacity', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 6 }),
      fc.array(operationArb, { maxLength: 40 }),
      (maxFiles, operations) => {
        const session = applyAll(500, maxFiles, operations);
        const paths = listFiles(session).map(f => f.path);

        assert.strictEqual(new Set(paths).size, paths.length);
        assert.ok(paths.length <= maxFiles);
        assert.deepStrictEqual(validateSession(session), { valid: true, problems: [] });
      }
    ));
  });

  it('leaves one entry with the latest content after re-pinning a path', () => {
    fc.assert(fc.property(pathArb, textArb, textArb, (path, first, second) => {
      const session = applyAll(10_000, 5, [
        { kind: 'file', path, content: first },
        { kind: 'file', path, content: second },
      ]);

      assert.strictEqual(session.files.entries.length, 1);
      assert.strictEqual(session.files.entries[0].content, second);
    }));
  });

  it('evicts the first of k + 1 distinct files', () => {
    fc.assert(fc.property(fc.integer({ min: 1, max: 10 }), k => {
      const operations: Operation[] = Array.from({ length: k + 1 }, (_, i) => ({
        kind: 'file' as const,
        path: `file-${i}`,
        content: 'x',
      }));
      const session = applyAll(10_000, k, operations);
      const paths = listFiles(session).map(f => f.path);

      assert.strictEqual(paths.length, k);
      assert.strictEqual(paths.includes('file-0'), false);
    }));
  });

  it('keeps conversation turns in insertion order', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 120 }),
      fc.array(fc.integer({ min: 0, max: 8 }), { maxLength: 30 }),
      (maxTokens, lengths) => {
        const session = createContextSession({ systemPrompt: 'sys', maxTokens }, { counter: wordCounter });
        lengths.forEach((n, i) => {
          appendMessage(session, 'user', [`m${i}`, ...Array(n).fill('w')].join(' '));
        });

        const indices = buildSessionPayloadReport(session).messages
          .slice(1)
          .map(m => Number(m.content.split(' ')[0].slice(1)));

        for (let i = 1; i < indices.length; i++) {
          assert.strictEqual(indices[i], indices[i - 1] + 1);
        }
        if (indices.length > 0) {
          assert.strictEqual(indices[indices.length - 1], lengths.length - 1);
        }
      }
    ));
  });

  it('counts identical text identically', () => {
    const tiktoken = createTiktokenCounter('cl100k_base');
    fc.assert(fc.property(fc.string(), text => {
      assert.strictEqual(heuristicCounter.count(text), heuristicCounter.count(text));
      assert.strictEqual(tiktoken.count(text), tiktoken.count(text));
      assert.ok(tiktoken.count(text) >= 0);
    }), { numRuns: 50 });
  });

  it('classifies ratios against ordered thresholds', () => {
    fc.assert(fc.property(
      fc.double({ min: 0, max: 2, noNaN: true }),
      fc.double({ min: 0.01, max: 0.99, noNaN: true }),
      fc.double({ min: 0.01, max: 0.99, noNaN: true }),
      (ratio, a, b) => {
        fc.pre(a !== b);
        const warn = Math.min(a, b);
        const critical = Math.max(a, b);
        const tier = classifyUsage(ratio, warn, critical);

        if (ratio <= warn) assert.strictEqual(tier, 'ok');
        else if (ratio <= critical) assert.strictEqual(tier, 'warn');
        else assert.strictEqual(tier, 'critical');
      }
    ));
  });
});
