import { describe, expect, it } from 'vitest';
import { extractCodeBlocks } from '../../../src/actions/unstructured/code-blocks.js';
import {
  EmbeddedFilenameStrategy,
  FilenameMentionStrategy,
  HeaderProximityStrategy,
  looksLikePath,
  pathFromHeaderLine,
  type ExtractionContext,
} from '../../../src/actions/unstructured/strategies.js';

function contextFor(text: string): ExtractionContext {
  return { text, lines: text.split('\n'), blocks: extractCodeBlocks(text) };
}

describe('pathFromHeaderLine', () => {
  it('should read markdown headings', () => {
    expect(pathFromHeaderLine('### src/index.ts')).toBe('src/index.ts');
  });

  it('should read bold and backtick lines', () => {
    expect(pathFromHeaderLine('**package.json**')).toBe('package.json');
    expect(pathFromHeaderLine('`Makefile`:')).toBe('Makefile');
  });

  it('should strip a "File:" label', () => {
    expect(pathFromHeaderLine('File: utils/helpers.py')).toBe('utils/helpers.py');
  });

  it('should reject prose', () => {
    expect(pathFromHeaderLine('Here is the code:')).toBeUndefined();
    expect(pathFromHeaderLine('')).toBeUndefined();
  });

  it('should reject parent directory segments', () => {
    expect(pathFromHeaderLine('### ../secret.txt')).toBeUndefined();
  });
});

describe('looksLikePath', () => {
  it('should accept extensions, directories and known names', () => {
    expect(looksLikePath('app.py')).toBe(true);
    expect(looksLikePath('src/lib')).toBe(true);
    expect(looksLikePath('Dockerfile')).toBe(true);
  });

  it('should reject words and version numbers', () => {
    expect(looksLikePath('hello')).toBe(false);
    expect(looksLikePath('v1.2')).toBe(false);
    expect(looksLikePath('two words.txt')).toBe(false);
  });
});

describe('HeaderProximityStrategy', () => {
  it('should pair a heading with the next block', () => {
    const result = new HeaderProximityStrategy().tryExtract(
      contextFor('Here is the app:\n\n### app.py\n\n```python\nprint("hi")\n```'),
      new Set()
    );

    expect(result.actions).toEqual([
      {
        kind: 'file',
        description: 'File from heading "### app.py"',
        path: 'app.py',
        content: 'print("hi")\n',
        op: 'create',
        language: 'python',
      },
    ]);
    expect([...result.claimed]).toEqual([0]);
  });

  it('should not claim a block twice', () => {
    const result = new HeaderProximityStrategy().tryExtract(
      contextFor('### a.py\n### b.py\n```python\nx = 1\n```'),
      new Set()
    );
    expect(result.actions.map((a) => a.path)).toEqual(['a.py']);
  });

  it('should ignore blocks beyond the window', () => {
    const filler = Array.from({ length: 11 }, (_, i) => `line ${i}`).join('\n');
    const result = new HeaderProximityStrategy(10).tryExtract(
      contextFor(`### far.py\n${filler}\n\`\`\`python\npass\n\`\`\``),
      new Set()
    );
    expect(result.actions).toEqual([]);
  });

  it('should skip blocks claimed earlier', () => {
    const result = new HeaderProximityStrategy().tryExtract(contextFor('### a.py\n```python\nx\n```'), new Set([0]));
    expect(result.actions).toEqual([]);
  });

  it('should leave shell blocks to commands unless the target is a script', () => {
    const notScript = new HeaderProximityStrategy().tryExtract(
      contextFor('### app.py\n```bash\nmkdir -p src\n```'),
      new Set()
    );
    const script = new HeaderProximityStrategy().tryExtract(
      contextFor('### setup.sh\n```bash\nmkdir -p src\n```'),
      new Set()
    );

    expect(notScript.actions).toEqual([]);
    expect(script.actions.map((a) => a.path)).toEqual(['setup.sh']);
  });
});

describe('EmbeddedFilenameStrategy', () => {
  it('should use the filename named inside the block', () => {
    const result = new EmbeddedFilenameStrategy().tryExtract(
      contextFor('Some code:\n```js\n// filename: src/util.js\nexport const x = 1;\n```'),
      new Set()
    );

    expect(result.actions).toEqual([
      {
        kind: 'file',
        description: 'File named inside code block',
        path: 'src/util.js',
        content: 'export const x = 1;\n',
        op: 'create',
        language: 'js',
      },
    ]);
  });
});

describe('FilenameMentionStrategy', () => {
  it('should pair a mentioned file with the following block', () => {
    const result = new FilenameMentionStrategy().tryExtract(
      contextFor('Save this as config.json in the root.\n\n```json\n{"a": 1}\n```'),
      new Set()
    );

    expect(result.actions).toEqual([
      {
        kind: 'file',
        description: 'File mentioned as config.json',
        path: 'config.json',
        content: '{"a": 1}\n',
        op: 'create',
        language: 'json',
      },
    ]);
  });

  it('should ignore unknown extensions and bare extensions', () => {
    const result = new FilenameMentionStrategy().tryExtract(
      contextFor('Use a .py file, or maybe notes.zzz here.\n```\ntext\n```'),
      new Set()
    );
    expect(result.actions).toEqual([]);
  });

  it('should pair each mention with its own block', () => {
    const result = new FilenameMentionStrategy().tryExtract(
      contextFor('First a.py then b.py:\n```python\none\n```\n```python\ntwo\n```'),
      new Set()
    );
    expect(result.actions.map((a) => [a.path, a.content])).toEqual([
      ['a.py', 'one\n'],
      ['b.py', 'two\n'],
    ]);
  });
});
