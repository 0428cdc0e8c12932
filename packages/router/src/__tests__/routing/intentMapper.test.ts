import { MalformedPayloadError } from '../../errors';
import { mapPayloadToIntent } from '../../routing/intentMapper';
import { createInboundMessage } from '../../types/messages';

const options = { defaultTarget: 'home', screenKey: 'screen' };

function map(payload: Record<string, string>) {
  return mapPayloadToIntent(createInboundMessage({ id: 'id-1', payload, receivedVia: 'background_tap' }), options);
}

describe('mapPayloadToIntent', () => {
  it('uses the screen entry as target', () => {
    const { intent, diagnostic } = map({ screen: 'chat', chatId: '123' });

    expect(intent).toEqual({ sourceMessageId: 'id-1', target: 'chat', params: { chatId: '123' } });
    expect(diagnostic).toBeNull();
  });

  it('falls back to the default target and keeps every other entry', () => {
    const { intent, diagnostic } = map({ chatId: '123', kind: 'reply' });

    expect(intent).toEqual({
      sourceMessageId: 'id-1',
      target: 'home',
      params: { chatId: '123', kind: 'reply' },
    });
    expect(diagnostic).toBeInstanceOf(MalformedPayloadError);
    expect(diagnostic?.code).toBe('MALFORMED_PAYLOAD');
    expect(diagnostic?.message).toBe('message id-1 has no "screen" entry');
  });

  it('treats a blank screen entry as missing', () => {
    const { intent, diagnostic } = map({ screen: '  ', chatId: '1' });

    expect(intent.target).toBe('home');
    expect(intent.params).toEqual({ chatId: '1' });
    expect(diagnostic?.message).toBe('message id-1 has an empty "screen" entry');
  });

  it('returns a params object that is independent of the frozen payload', () => {
    const { intent } = map({ screen: 'chat', chatId: '1' });
    intent.params['extra'] = 'x';

    expect(intent.params).toEqual({ chatId: '1', extra: 'x' });
  });

  it('passes a "__proto__" entry through as a param', () => {
    const payload: Record<string, string> = JSON.parse('{"screen":"chat","__proto__":"x","a":"1"}');
    const { intent } = map(payload);

    expect(intent.target).toBe('chat');
    expect(Object.entries(intent.params)).toEqual([
      ['__proto__', 'x'],
      ['a', '1'],
    ]);
  });
});
