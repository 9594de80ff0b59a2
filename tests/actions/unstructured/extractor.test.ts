import { describe, expect, it } from 'vitest';
import { extractCodeBlocks } from '../../../src/actions/unstructured/code-blocks.js';
import {
  UnstructuredActionExtractor,
  extractUnstructured,
  splitShellBlock,
} from '../../../src/actions/unstructured/extractor.js';
import type { ExtractionStrategy } from '../../../src/actions/unstructured/strategies.js';

describe('UnstructuredActionExtractor', () => {
  const extractor = new UnstructuredActionExtractor();

  describe('detectLikely', () => {
    it('should flag responses that talk about creating files', () => {
      expect(extractor.detectLikely('First, create a new file named index.ts')).toBe(true);
    });

    it('should flag shell blocks and package manager calls', () => {
      expect(extractor.detectLikely('```bash\nls\n```')).toBe(true);
      expect(extractor.detectLikely('Then npm install zod')).toBe(true);
    });

    it('should not flag plain conversation', () => {
      expect(extractor.detectLikely('Recursion is when a function calls itself.')).toBe(false);
    });
  });

  describe('extract', () => {
    it('should turn a heading and a python block into one file', () => {
      const { files, commands } = extractor.extract('Here is the app:\n\n### app.py\n\n```python\nprint("hi")\n```');

      expect(commands).toEqual([]);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatchObject({ path: 'app.py', op: 'create', content: 'print("hi")\n' });
    });

    it('should split unclaimed shell blocks into commands', () => {
      const text = 'Run these:\n```bash\n# setup\n$ mkdir -p src\nnpm install\necho done\ncd src && touch index.ts\n```';

      const { files, commands } = extractor.extract(text);

      expect(files).toEqual([]);
      expect(commands.map((c) => c.command)).toEqual(['mkdir -p src', 'npm install', 'cd src && touch index.ts']);
    });

    it('should never give one block to two actions', () => {
      const text = '### a.py\nAlso see b.py\n```python\nx = 1\n```\n```python\n# filename: c.py\ny = 2\n```';

      const { files } = extractor.extract(text);
      const contents = files.map((f) => f.content);

      expect(new Set(contents).size).toBe(contents.length);
      expect(files.map((f) => f.path)).toEqual(['a.py', 'c.py']);
    });

    it('should run strategies in the order given', () => {
      const calls: string[] = [];
      const spy = (name: string): ExtractionStrategy => ({
        name,
        tryExtract: (_context, claimed) => {
          calls.push(name);
          return { actions: [], claimed };
        },
      });

      new UnstructuredActionExtractor({ strategies: [spy('one'), spy('two')] }).extract('text');

      expect(calls).toEqual(['one', 'two']);
    });
  });

  describe('extractActions', () => {
    it('should queue commands before files', () => {
      const text = '### main.py\n```python\nprint(1)\n```\n\n```bash\nmkdir -p out\n```';

      const { actions, foundAny } = extractor.extractActions(text);

      expect(foundAny).toBe(true);
      expect(actions.map((a) => a.kind)).toEqual(['command', 'file']);
      expect(actions[0]).toMatchObject({ command: 'mkdir -p out' });
    });

    it('should report when nothing was found', () => {
      expect(extractor.extractActions('No code here.')).toEqual({ actions: [], foundAny: false });
    });
  });
});

describe('splitShellBlock', () => {
  it('should drop lines without a known verb', () => {
    const [block] = extractCodeBlocks('```sh\nls -la\ngit status\nnode index.js\n```');
    expect(block && splitShellBlock(block).map((c) => c.command)).toEqual(['node index.js']);
  });

  it('should not match a verb inside another word', () => {
    const [block] = extractCodeBlocks('```sh\nnpmrc-check\nmkdirs foo\n```');
    expect(block && splitShellBlock(block)).toEqual([]);
  });
});

describe('extractUnstructured', () => {
  it('should return actions and the found flag as a pair', () => {
    const [actions, foundAny] = extractUnstructured('```bash\nnpx tsc --init\n```');
    expect(foundAny).toBe(true);
    expect(actions).toEqual([{ kind: 'command', description: 'Shell command from response', command: 'npx tsc --init' }]);
  });
});
