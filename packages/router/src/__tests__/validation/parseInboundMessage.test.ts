import { parseInboundMessage, parsePayload } from '../../validation/parseInboundMessage';

describe('parseInboundMessage', () => {
  it('parses a complete message', () => {
    const parsed = parseInboundMessage({
      id: 'msg-1',
      payload: { screen: 'chat', chatId: '123' },
      title: 'New reply',
      body: 'Hi there',
      receivedVia: 'foreground',
    });

    expect(parsed).toEqual({
      id: 'msg-1',
      payload: { screen: 'chat', chatId: '123' },
      title: 'New reply',
      body: 'Hi there',
      receivedVia: 'foreground',
    });
    expect(Object.isFrozen(parsed)).toBe(true);
    expect(Object.isFrozen(parsed.payload)).toBe(true);
  });

  it('takes the channel from the caller when given', () => {
    const parsed = parseInboundMessage({ id: 'msg-2', receivedVia: 'foreground' }, 'cold_start');

    expect(parsed.receivedVia).toBe('cold_start');
    expect(parsed.payload).toEqual({});
    expect('title' in parsed).toBe(false);
  });

  it('rejects a missing id', () => {
    expect(() => parseInboundMessage({ payload: {} }, 'foreground')).toThrow(
      /id must be a non-empty string/
    );
  });

  it('rejects an unknown channel', () => {
    expect(() => parseInboundMessage({ id: 'x', receivedVia: 'sideways' })).toThrow(
      /receivedVia must be one of foreground, background_tap, cold_start/
    );
  });

  it('rejects a non-object message', () => {
    expect(() => parseInboundMessage('hello', 'foreground')).toThrow(/message must be an object/);
  });

  it('rejects a non-string title', () => {
    expect(() => parseInboundMessage({ id: 'x', title: 42 }, 'foreground')).toThrow(
      /title must be a string/
    );
  });
});

describe('parsePayload', () => {
  it('coerces scalar and structured values to strings and drops nulls', () => {
    expect(
      parsePayload({ count: 3, urgent: true, tags: ['a', 'b'], missing: null, name: 'x' })
    ).toEqual({ count: '3', urgent: 'true', tags: '["a","b"]', name: 'x' });
  });

  it('keeps a "__proto__" entry as an ordinary key', () => {
    const message = parseInboundMessage(
      JSON.parse('{"id":"p","payload":{"screen":"chat","__proto__":"x"}}'),
      'background_tap'
    );

    expect(Object.entries(message.payload)).toEqual([
      ['screen', 'chat'],
      ['__proto__', 'x'],
    ]);
    expect(Object.getPrototypeOf(message.payload)).toBe(Object.prototype);
  });

  it('rejects an array payload', () => {
    expect(() => parsePayload(['a'])).toThrow(/payload must be an object/);
  });
});
