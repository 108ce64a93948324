import { describe, it, expect } from 'vitest';
import { extractEventText, unwrapFunctionResponse } from '../../src/events/extract.js';
import type { EventPart } from '../../src/events/types.js';

function response(value: unknown): EventPart {
  return { kind: 'function-response', id: 'call-1', name: 'IdeateAgent', response: value };
}

describe('extractEventText', () => {
  it('should return empty text without parts', () => {
    expect(extractEventText(undefined)).toBe('');
    expect(extractEventText([])).toBe('');
  });

  it('should return the first non-empty text part verbatim', () => {
    const parts: EventPart[] = [
      { kind: 'text', text: '' },
      { kind: 'text', text: '  Idea A expanded  ' },
      { kind: 'text', text: 'ignored' },
    ];
    expect(extractEventText(parts)).toBe('  Idea A expanded  ');
  });

  it('should prefer text over a function response', () => {
    expect(extractEventText([response({ result: 'from tool' }), { kind: 'text', text: 'direct' }])).toBe(
      'direct'
    );
  });

  it('should serialize structured results', () => {
    expect(extractEventText([response({ result: { score: 5 } })])).toBe('{"score":5}');
  });

  it('should unwrap output before result', () => {
    expect(extractEventText([response({ output: 'first', result: 'second' })])).toBe('first');
  });

  it('should stringify raw scalar responses', () => {
    expect(extractEventText([response(42)])).toBe('42');
    expect(extractEventText([response([1, 2])])).toBe('[1,2]');
  });

  it('should skip null responses and function calls', () => {
    const parts: EventPart[] = [
      { kind: 'function-call', id: 'call-1', name: 'IdeateAgent', args: { request: 'x' } },
      response(null),
    ];
    expect(extractEventText(parts)).toBe('');
  });

  it('should yield empty text for circular payloads', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(extractEventText([response({ result: circular })])).toBe('');
  });
});

describe('unwrapFunctionResponse', () => {
  it('should return non-record values unchanged', () => {
    expect(unwrapFunctionResponse('plain')).toBe('plain');
    expect(unwrapFunctionResponse(['a'])).toEqual(['a']);
  });

  it('should return the record itself without output or result', () => {
    expect(unwrapFunctionResponse({ other: 1 })).toEqual({ other: 1 });
  });
});
