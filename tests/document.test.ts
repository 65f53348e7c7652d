import { describe, it, expect } from 'vitest';
import { parseDocument, serializeDocument } from '../src/services/document';
import { DocumentParseError } from '../src/utils/errors';

describe('parseDocument', () => {
  it('should return empty front matter for text without a delimiter', () => {
    const content = '# Venlafaxine\n\nAn SNRI.';

    expect(parseDocument(content)).toEqual({ frontMatter: {}, body: content });
  });

  it('should split front matter from the body', () => {
    const result = parseDocument('---\ntitle: Venlafaxine\norder: 2\nen-slug: venlafaxine-guide\n---\nBody text\n');

    expect(result.frontMatter).toEqual({
      title: 'Venlafaxine',
      order: 2,
      'en-slug': 'venlafaxine-guide',
    });
    expect(result.body).toBe('Body text\n');
  });

  it('should treat an unterminated block as plain text', () => {
    const content = '---\ntitle: Draft\nno closing delimiter';

    expect(parseDocument(content)).toEqual({ frontMatter: {}, body: content });
  });

  it('should not treat a horizontal rule as front matter', () => {
    const content = '----\nSection\n----\n';

    expect(parseDocument(content)).toEqual({ frontMatter: {}, body: content });
  });

  it('should throw DocumentParseError for malformed YAML', () => {
    expect(() => parseDocument('---\ntitle: [unclosed\n---\nBody', 'broken.md')).toThrow(
      DocumentParseError
    );
  });

  it('should throw DocumentParseError when front matter is not a mapping', () => {
    expect(() => parseDocument('---\n- a\n- b\n---\nBody')).toThrow(DocumentParseError);
    expect(() => parseDocument('---\njust text\n---\nBody')).toThrow(DocumentParseError);
  });

  it('should read comment-only front matter as empty', () => {
    expect(parseDocument('---\n# draft\n---\nBody\n')).toEqual({ frontMatter: {}, body: 'Body\n' });
  });

  it('should not share parsed data between calls', () => {
    const content = '---\ntitle: Shared\n---\nBody\n';
    const first = parseDocument(content);
    first.frontMatter.title = 'Changed';

    expect(parseDocument(content).frontMatter.title).toBe('Shared');
  });
});

describe('serializeDocument', () => {
  it('should write front matter followed by the body', () => {
    const output = serializeDocument({
      frontMatter: { title: 'Hola', language: 'es' },
      body: 'Texto\n',
    });

    expect(output).toBe('---\ntitle: Hola\nlanguage: es\n---\nTexto\n');
  });

  it('should write only the body when front matter is empty', () => {
    expect(serializeDocument({ frontMatter: {}, body: 'Only text' })).toBe('Only text\n');
  });

  it('should write date strings back as plain dates', () => {
    const output = serializeDocument({
      frontMatter: { translation_date: '2026-01-15' },
      body: 'Body\n',
    });

    expect(output).toBe('---\ntranslation_date: 2026-01-15\n---\nBody\n');
    expect(parseDocument(output).frontMatter.translation_date).toBe('2026-01-15');
  });

  it('should keep dates unchanged through parse and serialize', () => {
    const content = '---\ndate: 2024-03-05\ntitle: T\n---\nBody\n';
    const document = parseDocument(content);

    expect(document.frontMatter.date).toBe('2024-03-05');
    expect(serializeDocument(document)).toBe(content);
  });

  it('should quote strings that would read back as another type', () => {
    const output = serializeDocument({ frontMatter: { code: '007', draft: 'true' }, body: 'x\n' });

    expect(parseDocument(output).frontMatter).toEqual({ code: '007', draft: 'true' });
  });
});
