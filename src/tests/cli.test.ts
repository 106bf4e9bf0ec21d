import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { runEstimate, runCLI, progressBar, formatUsage } from '../cli.js';
import { wordCounter, words } from './fixtures.js';

describe('CLI', () => {
  describe('runEstimate', () => {
    const testDir = join(tmpdir(), 'context-budget-cli-test-' + Date.now());

    beforeEach(() => {
      mkdirSync(testDir, { recursive: true });
      writeFileSync(join(testDir, 'a.txt'), 'one');
      writeFileSync(join(testDir, 'b.txt'), words(20));
      writeFileSync(join(testDir, 'c.txt'), 'two');
      writeFileSync(join(testDir, 'd.txt'), 'three');
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('pins files in order and reports what did not fit', () => {
      const result = runEstimate(
        ['a.txt', 'b.txt', 'c.txt', 'd.txt', 'missing.txt'],
        { systemPrompt: 'sys', maxTokens: 100, maxFileContexts: 2 },
        { basePath: testDir, counter: wordCounter }
      );

      assert.deepStrictEqual(result.lines, [
        { path: 'a.txt', tokens: 6, status: 'pinned' },
        { path: 'b.txt', tokens: 25, status: 'too_large' },
        { path: 'c.txt', tokens: 6, status: 'pinned' },
        { path: 'd.txt', tokens: 6, status: 'pinned' },
        { path: 'missing.txt', tokens: null, status: 'unreadable', detail: 'File not found: missing.txt' },
      ]);
      assert.deepStrictEqual(result.evicted, ['a.txt']);
      assert.deepStrictEqual(result.usage, { totalTokens: 12, ratio: 0.12, tier: 'ok' });
      assert.strictEqual(result.maxTokens, 100);
      assert.strictEqual(result.perFileTokenCap, 10);
    });

    it('reports nothing pinned for an empty list', () => {
      const result = runEstimate([], { systemPrompt: 'sys' }, { basePath: testDir, counter: wordCounter });
      assert.deepStrictEqual(result.lines, []);
      assert.strictEqual(result.usage.totalTokens, 0);
    });
  });

  describe('progressBar', () => {
    it('fills in proportion to the ratio', () => {
      assert.strictEqual(progressBar(0.5, 10), '█████\x1b[2m░░░░░\x1b[0m');
    });

    it('clamps ratios outside [0, 1]', () => {
      assert.strictEqual(progressBar(1.7, 4), '████\x1b[2m\x1b[0m');
      assert.strictEqual(progressBar(-1, 4), '\x1b[2m░░░░\x1b[0m');
    });
  });

  describe('formatUsage', () => {
    it('colors by tier and shows the percentage', () => {
      const line = formatUsage({ totalTokens: 50, ratio: 0.5, tier: 'ok' }, 100);
      assert.strictEqual(
        line,
        '\x1b[32m' + progressBar(0.5) + '\x1b[0m \x1b[32mOK\x1b[0m 50/100 tokens (50.0%)'
      );
    });
  });

  describe('runCLI', () => {
    it('hands the server command back to the caller', () => {
      assert.strictEqual(runCLI(['server']), 'server');
    });

    it('handles help, unknown commands and estimate without files', () => {
      assert.strictEqual(runCLI(['help']), 'handled');
      assert.strictEqual(runCLI(['frobnicate']), 'handled');
      assert.strictEqual(runCLI(['estimate']), 'handled');
    });
  });
});
