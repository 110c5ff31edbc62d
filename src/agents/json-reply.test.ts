import { describe, it, expect } from 'vitest';
import { extractJson, extractPlainText } from './json-reply.js';

describe('extractJson', () => {
  it('parses a bare object', () => {
    expect(extractJson(' {"topics": ["a"]} ')).toEqual({ topics: ['a'] });
  });

  it('parses a fenced block', () => {
    expect(extractJson('Here it is:\n```json\n{"comment": "ok"}\n```\nThanks.')).toEqual({
      comment: 'ok',
    });
  });

  it('parses an object surrounded by prose', () => {
    expect(extractJson('Sure! {"a": {"b": 1}} Hope that helps')).toEqual({ a: { b: 1 } });
  });

  it('returns undefined when nothing parses', () => {
    expect(extractJson('no json here')).toBeUndefined();
    expect(extractJson('{broken')).toBeUndefined();
  });
});

describe('extractPlainText', () => {
  it('trims and unwraps quotes', () => {
    expect(extractPlainText('  "Как работает GIL?"  ')).toBe('Как работает GIL?');
    expect(extractPlainText('«Что такое индекс?»')).toBe('Что такое индекс?');
  });

  it('unwraps a fenced block', () => {
    expect(extractPlainText('```\nЧто такое WAL?\n```')).toBe('Что такое WAL?');
  });

  it('keeps inner quotes', () => {
    expect(extractPlainText('Чем «Redis» отличается от Memcached?')).toBe(
      'Чем «Redis» отличается от Memcached?'
    );
  });
});
