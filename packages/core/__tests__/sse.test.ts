import { describe, expect, test } from 'vitest';
import { SseDecoder } from '../src/client/sse';

describe('SseDecoder', () => {
  test('should join messages split across chunks', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: {"a"')).toEqual([]);
    expect(decoder.push(':1}\n\n')).toEqual([{ data: '{"a":1}' }]);
  });

  test('should handle CRLF, comments and named fields', () => {
    const decoder = new SseDecoder();
    const messages = decoder.push(': keepalive\r\nevent: status\r\ndata: x\r\nid: 7\r\n\r\n');
    expect(messages).toEqual([{ event: 'status', data: 'x', id: '7' }]);
  });

  test('should join multi-line data with newlines', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('data: a\ndata: b\n\n')).toEqual([{ data: 'a\nb' }]);
  });

  test('should skip messages without data', () => {
    const decoder = new SseDecoder();
    expect(decoder.push('event: ping\n\ndata: ok\n\n')).toEqual([{ data: 'ok' }]);
  });
});
