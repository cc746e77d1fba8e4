// Unit tests for the marked-backed markdown parser

import { describe, it, expect } from 'vitest';
import { marked } from 'marked';
import { extractText } from '../../src/converter/inline-formatter';
import { ParseError } from '../../src/errors';
import {
  MarkedMarkdownParser,
  codespanContent,
  loadMarkdownParser
} from '../../src/parsers/markdown-parser';
import type { BlockNode } from '../../src/types/markdown.types';

const parser = new MarkedMarkdownParser((src) => marked.lexer(src));

function parseNodes(text: string): BlockNode[] {
  const result = parser.parse(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.nodes;
}

describe('MarkedMarkdownParser', () => {
  describe('Block mapping', () => {
    it('should map headings and paragraphs with inline children', () => {
      const nodes = parseNodes('# Title\n\nSome **bold** and *italic* text.');

      expect(nodes).toEqual([
        { kind: 'heading', level: 1, children: [{ kind: 'text', raw: 'Title' }] },
        {
          kind: 'paragraph',
          children: [
            { kind: 'text', raw: 'Some ' },
            { kind: 'strong', children: [{ kind: 'text', raw: 'bold' }] },
            { kind: 'text', raw: ' and ' },
            { kind: 'emphasis', children: [{ kind: 'text', raw: 'italic' }] },
            { kind: 'text', raw: ' text.' }
          ]
        }
      ]);
    });

    it('should keep the heading depth', () => {
      expect(parseNodes('###### six')).toMatchObject([{ kind: 'heading', level: 6 }]);
    });

    it('should map nested tight lists to list items holding paragraphs', () => {
      const nodes = parseNodes('- a\n- b\n  - c');

      expect(nodes).toMatchObject([
        {
          kind: 'list',
          ordered: false,
          children: [
            { kind: 'list_item', children: [{ kind: 'paragraph', children: [{ kind: 'text', raw: 'a' }] }] },
            {
              kind: 'list_item',
              children: [
                { kind: 'paragraph', children: [{ kind: 'text', raw: 'b' }] },
                {
                  kind: 'list',
                  ordered: false,
                  children: [
                    { kind: 'list_item', children: [{ kind: 'paragraph', children: [{ kind: 'text', raw: 'c' }] }] }
                  ]
                }
              ]
            }
          ]
        }
      ]);
    });

    it('should flag ordered lists', () => {
      expect(parseNodes('3. x\n4. y')).toMatchObject([{ kind: 'list', ordered: true }]);
    });

    it('should map fenced code and thematic breaks', () => {
      expect(parseNodes('```\nconst a = 1;\n```')).toEqual([{ kind: 'block_code', raw: 'const a = 1;' }]);
      expect(parseNodes('a\n\n---\n\nb').map(node => node.kind)).toEqual(['paragraph', 'thematic_break', 'paragraph']);
    });

    it('should drop blank space between blocks', () => {
      expect(parseNodes('first\n\n\n\nsecond').map(node => node.kind)).toEqual(['paragraph', 'paragraph']);
    });

    it('should expose unsupported blocks as unknown nodes', () => {
      const [quote] = parseNodes('> quoted');
      expect(quote).toMatchObject({ kind: 'unknown', type: 'blockquote' });
      expect(extractText([quote])).toBe('quoted');

      expect(parseNodes('| a |\n| --- |\n| 1 |')).toMatchObject([{ kind: 'unknown', type: 'table' }]);
    });
  });

  describe('Inline mapping', () => {
    it('should keep literal characters instead of HTML entities', () => {
      expect(extractText(parseNodes('Fish & chips'))).toBe('Fish & chips');
    });

    it('should decode entity references in text', () => {
      expect(extractText(parseNodes('&amp; &copy; x'))).toBe('& © x');
      expect(extractText(parseNodes('&#220;bersicht &#x41;'))).toBe('Übersicht A');
    });

    it('should leave entity references inside code spans alone', () => {
      expect(extractText(parseNodes('`&amp;`'))).toBe('&amp;');
    });

    it('should unescape backslash escapes', () => {
      expect(extractText(parseNodes('a \\* b'))).toBe('a * b');
    });

    it('should map code spans, links and hard breaks', () => {
      expect(parseNodes('Run `npm test` now')).toEqual([
        {
          kind: 'paragraph',
          children: [
            { kind: 'text', raw: 'Run ' },
            { kind: 'codespan', raw: 'npm test' },
            { kind: 'text', raw: ' now' }
          ]
        }
      ]);

      expect(parseNodes('[docs](https://example.com/docs)')).toEqual([
        {
          kind: 'paragraph',
          children: [{ kind: 'link', url: 'https://example.com/docs', children: [{ kind: 'text', raw: 'docs' }] }]
        }
      ]);

      expect(parseNodes('one  \ntwo')).toEqual([
        {
          kind: 'paragraph',
          children: [{ kind: 'text', raw: 'one' }, { kind: 'linebreak' }, { kind: 'text', raw: 'two' }]
        }
      ]);
    });

    it('should treat strikethrough as unknown with its text preserved', () => {
      const [paragraph] = parseNodes('~~gone~~');

      expect(paragraph).toMatchObject({
        kind: 'paragraph',
        children: [{ kind: 'unknown', type: 'del', children: [{ kind: 'text', raw: 'gone' }] }]
      });
    });
  });

  describe('Failures', () => {
    it('should report lexer exceptions as a failed result', () => {
      const cause = new Error('bad input');
      const failing = new MarkedMarkdownParser(() => {
        throw cause;
      });

      const result = failing.parse('anything');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError);
        expect(result.error.message).toBe('Markdown parsing failed: bad input');
        expect(result.error.cause).toBe(cause);
      }
    });
  });
});

describe('codespanContent', () => {
  it.each([
    ['`code`', 'code'],
    ['`` a ` b ``', 'a ` b'],
    ['`  `', '  '],
    ['`a\nb`', 'a b'],
    ['`<tag>`', '<tag>'],
    ['not a span', 'not a span']
  ])('should read %j as %j', (raw, content) => {
    expect(codespanContent(raw)).toBe(content);
  });
});

describe('loadMarkdownParser', () => {
  it('should resolve a working parser when marked is installed', async () => {
    const loaded = await loadMarkdownParser();

    expect(loaded).not.toBeNull();
    expect(loaded?.parse('# Hi')).toEqual({
      ok: true,
      nodes: [{ kind: 'heading', level: 1, children: [{ kind: 'text', raw: 'Hi' }] }]
    });
  });
});
