import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Dataset } from '../src/datasets/base.js';
import { loadContextStore } from '../src/datasets/contexts.js';
import { JsonlClassificationDataset, readJsonLines } from '../src/datasets/jsonl.js';
import { JsonlRagDataset } from '../src/datasets/jsonl-rag.js';
import {
  ConfigurationError,
  DatasetLoadError,
  MalformedExampleError,
} from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { createExample, type Example } from '../src/types.js';

const FIXTURES = fileURLToPath(new URL('./fixtures', import.meta.url));

class CountingDataset extends Dataset {
  loads = 0;

  constructor(private readonly rows: Example[] | (() => Example[])) {
    super();
  }

  get source(): string {
    return 'memory';
  }

  protected load(): Example[] {
    this.loads++;
    return typeof this.rows === 'function' ? this.rows() : this.rows;
  }
}

const example = (uid: string) => createExample({ uid, inputs: { text: uid }, expectedOutput: 'x' });

describe('Dataset', () => {
  it('loads once and returns the same frozen array', () => {
    const dataset = new CountingDataset([example('a'), example('b')]);
    expect(dataset.loaded).toBe(false);
    const first = dataset.examples();
    const second = dataset.examples();
    expect(second).toBe(first);
    expect(dataset.loads).toBe(1);
    expect(dataset.loaded).toBe(true);
    expect(Object.isFrozen(first)).toBe(true);
    expect(dataset.size).toBe(2);
    expect([...dataset].map((e) => e.uid)).toEqual(['a', 'b']);
  });

  it('rejects duplicate uids', () => {
    const dataset = new CountingDataset([example('a'), example('a')]);
    expect(() => dataset.examples()).toThrow(
      "Example 'a' has an invalid 'uid' field: duplicate uid in memory",
    );
  });

  it('wraps unexpected load failures', () => {
    const dataset = new CountingDataset(() => {
      throw new TypeError('boom');
    });
    expect(() => dataset.examples()).toThrow(DatasetLoadError);
    expect(() => dataset.examples()).toThrow('Failed to load dataset from memory: boom');
    expect(dataset.loaded).toBe(false);
  });
});

describe('file-backed datasets', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'evalkit-datasets-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(tmpDir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  describe('readJsonLines', () => {
    it('skips blank lines and reports physical line indexes', () => {
      const path = write('data.jsonl', '{"a": 1}\n\n  \n{"a": 2}\n');
      expect([...readJsonLines(path)]).toEqual([
        { index: 0, value: { a: 1 } },
        { index: 3, value: { a: 2 } },
      ]);
    });

    it('reports the line of invalid JSON', () => {
      const path = write('data.jsonl', '{"a": 1}\n{oops\n');
      expect(() => [...readJsonLines(path)]).toThrow(`Invalid JSON in ${path} at line 2`);
    });

    it('requires objects', () => {
      const path = write('data.jsonl', '[1, 2]\n');
      expect(() => [...readJsonLines(path)]).toThrow(`Expected a JSON object in ${path} at line 1`);
    });
  });

  describe('JsonlClassificationDataset', () => {
    it('reads text, label and extra fields', () => {
      const lines: string[] = [];
      const logger = createLogger({ level: 'info', sink: (_level, line) => lines.push(line) });
      const dataset = new JsonlClassificationDataset({ path: join(FIXTURES, 'sentiment.jsonl') }, logger);

      const examples = dataset.examples();
      expect(examples).toHaveLength(6);
      expect(examples[0]).toEqual({
        uid: 'r1',
        inputs: { text: 'I love this phone' },
        expectedOutput: 'positive',
        metadata: { source: 'review' },
      });
      expect(examples[3].inputs).toEqual({ text: 'I hate waiting in line' });
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain(`Loaded 6 examples from ${join(FIXTURES, 'sentiment.jsonl')}`);
    });

    it('falls back to the line index for uids', () => {
      const path = write('data.jsonl', '\n{"text": "a", "label": 0}\n{"text": "b", "label": 1}\n');
      const dataset = new JsonlClassificationDataset({ path });
      expect(dataset.examples().map((e) => e.uid)).toEqual(['1', '2']);
      expect(dataset.examples().map((e) => e.expectedOutput)).toEqual([0, 1]);
    });

    it('names the missing field', () => {
      const path = write('data.jsonl', '{"id": "x", "label": "a"}\n');
      const dataset = new JsonlClassificationDataset({ path });
      let caught: unknown;
      try {
        dataset.examples();
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(MalformedExampleError);
      if (caught instanceof MalformedExampleError) {
        expect(caught.uid).toBe('x');
        expect(caught.field).toBe('text');
      }
    });

    it('requires a label', () => {
      const path = write('data.jsonl', '{"id": "x", "text": "hello"}\n');
      expect(() => new JsonlClassificationDataset({ path }).examples()).toThrow(
        `Example 'x' has an invalid 'label' field: missing 'label' in ${path}`,
      );
    });

    it('rejects non-string text', () => {
      const path = write('data.jsonl', '{"id": "x", "text": 3, "label": "a"}\n');
      expect(() => new JsonlClassificationDataset({ path }).examples()).toThrow(
        MalformedExampleError,
      );
    });

    it('wraps a missing file', () => {
      const path = join(tmpDir, 'absent.jsonl');
      const dataset = new JsonlClassificationDataset({ path });
      expect(() => dataset.examples()).toThrow(DatasetLoadError);
      expect(() => dataset.examples()).toThrow(`Failed to load dataset from ${path}`);
    });

    it('validates parameters', () => {
      expect(() => JsonlClassificationDataset.fromParams({})).toThrow(ConfigurationError);
      expect(() => JsonlClassificationDataset.fromParams({})).toThrow(
        /^Invalid parameters for 'jsonl-classification': path: /,
      );
    });
  });

  describe('loadContextStore', () => {
    it('reads a list of objects', () => {
      const store = loadContextStore(join(FIXTURES, 'contexts.json'));
      expect([...store.entries()]).toEqual([
        ['c1', 'Paris is the capital and largest city of France.'],
        ['c2', 'The Seine flows through the heart of Paris.'],
      ]);
    });

    it('reads a mapping', () => {
      const path = write('contexts.json', '{"a": "alpha", "b": "beta"}');
      expect(Object.fromEntries(loadContextStore(path))).toEqual({ a: 'alpha', b: 'beta' });
    });

    it('reads JSONL with positional ids', () => {
      const path = write('contexts.jsonl', '{"text": "zero"}\n{"id": 7, "content": "seven"}\n');
      expect(Object.fromEntries(loadContextStore(path))).toEqual({ '0': 'zero', '7': 'seven' });
    });

    it('reports a missing file', () => {
      const path = join(tmpDir, 'nope.json');
      expect(() => loadContextStore(path)).toThrow(`Context file not found at ${path}`);
    });

    it('rejects mapping values that are not strings', () => {
      const path = write('contexts.json', '{"a": 1}');
      expect(() => loadContextStore(path)).toThrow(`Context 'a' in ${path} must map to a string`);
    });

    it('rejects entries without text', () => {
      const path = write('contexts.json', '[{"id": "a"}]');
      expect(() => loadContextStore(path)).toThrow(
        `Context entry 'a' in ${path} is missing a 'text' field`,
      );
    });
  });

  describe('JsonlRagDataset', () => {
    it('attaches referenced contexts', () => {
      const dataset = new JsonlRagDataset({
        path: join(FIXTURES, 'faq.jsonl'),
        contextsPath: join(FIXTURES, 'contexts.json'),
      });
      const [first, second, third] = dataset.examples();

      expect(first).toEqual({
        uid: 'q1',
        inputs: {
          question: 'What is the capital of France?',
          text: 'What is the capital of France?',
        },
        expectedOutput: 'Paris is the capital of France',
        metadata: {
          context_ids: ['c1'],
          reference_contexts: ['Paris is the capital and largest city of France.'],
        },
      });
      expect(second.metadata).toEqual({
        topic: 'geography',
        context_ids: ['c2', 'missing'],
        reference_contexts: ['The Seine flows through the heart of Paris.'],
      });
      expect(third.expectedOutput).toBe('About 330 metres');
      expect(third.metadata).toEqual({});
    });

    it('leaves reference contexts empty without a context store', () => {
      const path = write('qa.jsonl', '{"question": "q", "answer": "a", "context_ids": "c1"}\n');
      const [only] = new JsonlRagDataset({ path }).examples();
      expect(only.metadata).toEqual({ context_ids: ['c1'], reference_contexts: [] });
    });

    it('requires an answer', () => {
      const path = write('qa.jsonl', '{"id": "q", "question": "why?"}\n');
      expect(() => new JsonlRagDataset({ path }).examples()).toThrow(
        `Example 'q' has an invalid 'answer' field: missing 'answer' in ${path}`,
      );
    });

    it('reads parameters in camelCase', () => {
      const dataset = JsonlRagDataset.fromParams({ path: 'a.jsonl', contextsPath: 'c.json' });
      expect(dataset.path).toBe('a.jsonl');
      expect(dataset.contextsPath).toBe('c.json');
    });
  });
});
