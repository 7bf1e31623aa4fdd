/**
 * HTTP Chat Gateway Tests
 *
 * The gateway is exercised against an injected fetch; no network is used.
 */

import { describe, it, expect, vi } from 'vitest';
import { GatewayError } from '../../src/core/errors';
import { HttpChatGateway, parseSendResponse, toWireMessage } from '../../src/gateway/http-gateway';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createGateway(respond: () => Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>(respond);
  const gateway = new HttpChatGateway({
    baseUrl: 'http://gateway.test',
    serviceId: 'svc-1',
    timeoutMs: 1000,
    fetch: fetchMock,
  });
  return { gateway, fetchMock };
}

describe('toWireMessage', () => {
  it('renders a plain message', () => {
    expect(toWireMessage({ type: 'SIMPLE', userId: 'p1', text: 'Hi' })).toEqual({
      user_id: 'p1',
      type: 'SIMPLE',
      text: 'Hi',
    });
  });

  it('renders buttons', () => {
    expect(
      toWireMessage({ type: 'WITH_BUTTONS', userId: 'p1', text: 'Pick', buttons: ['x', 'y'] })
    ).toEqual({ user_id: 'p1', type: 'WITH_BUTTONS', text: 'Pick', buttons: ['x', 'y'] });
  });

  it('renders a reply with its target', () => {
    expect(toWireMessage({ type: 'REPLY', userId: 'p1', text: 'Still there?', replyTo: '42' })).toEqual(
      { user_id: 'p1', type: 'REPLY', text: 'Still there?', reply_to: '42' }
    );
  });
});

describe('parseSendResponse', () => {
  it('reads a numeric message id', () => {
    expect(parseSendResponse({ sent_messages: [{ message_id: 17 }] }, 200)).toEqual({
      messageHandle: '17',
    });
  });

  it('accepts a message id sent as a string of digits', () => {
    expect(parseSendResponse({ sent_messages: [{ message_id: '0042' }] }, 200)).toEqual({
      messageHandle: '0042',
    });
  });

  it.each([
    ['a non-numeric id', { sent_messages: [{ message_id: 'abc' }] }],
    ['no sent messages', { sent_messages: [] }],
    ['a missing id', { sent_messages: [{}] }],
    ['an unrelated body', { ok: true }],
  ])('rejects %s', (_label, body) => {
    expect(() => parseSendResponse(body, 200)).toThrow(GatewayError);
  });
});

describe('HttpChatGateway', () => {
  it('posts the message with the service id', async () => {
    const { gateway, fetchMock } = createGateway(async () =>
      jsonResponse({ sent_messages: [{ message_id: 5 }] })
    );

    const result = await gateway.send({ type: 'SIMPLE', userId: 'p1', text: 'Hello' });

    expect(result).toEqual({ messageHandle: '5' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://gateway.test/message');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      service_id: 'svc-1',
      messages: [{ user_id: 'p1', type: 'SIMPLE', text: 'Hello' }],
    });
  });

  it('raises GatewayError with the status on a non-2xx response', async () => {
    const { gateway } = createGateway(async () => new Response('down', { status: 503 }));

    const error = await gateway.send({ type: 'SIMPLE', userId: 'p1', text: 'Hello' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({
      message: 'Gateway responded with HTTP 503',
      status: 503,
      details: { body: 'down' },
    });
  });

  it('raises GatewayError when the body is not JSON', async () => {
    const { gateway } = createGateway(async () => new Response('<html>', { status: 200 }));

    await expect(gateway.send({ type: 'SIMPLE', userId: 'p1', text: 'Hello' })).rejects.toThrow(
      'Gateway response is not valid JSON'
    );
  });

  it('wraps a failed request', async () => {
    const { gateway } = createGateway(async () => {
      throw new TypeError('connection refused');
    });

    await expect(gateway.send({ type: 'SIMPLE', userId: 'p1', text: 'Hello' })).rejects.toThrow(
      'Gateway request failed: connection refused'
    );
  });
});
