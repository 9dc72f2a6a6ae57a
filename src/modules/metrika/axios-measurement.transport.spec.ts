import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { AxiosMeasurementTransport } from './axios-measurement.transport';
import { MetrikaConfig } from './metrika.types';

const config: MetrikaConfig = {
  counterId: '98765432',
  measurementToken: 'test-secret',
  collectUrl: 'https://collector.test/collect',
  requestTimeoutMs: 5_000,
  botUsername: 'test_bot',
  currency: 'RUB',
  brand: 'Test Brand',
};

type Reply = { status: number; data?: string } | { error: Error };

function transportReplying(reply: Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (request) => {
      requests.push(request);
      if ('error' in reply) {
        throw reply.error;
      }
      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config: request,
      };
    },
  });
  return { transport: new AxiosMeasurementTransport(config, http), requests };
}

describe('AxiosMeasurementTransport', () => {
  it('sends the hit as query parameters to the collect url', async () => {
    const { transport, requests } = transportReplying({ status: 200 });

    await expect(
      transport.send('pageview', { tid: '98765432', cid: '1234567890' }),
    ).resolves.toBe(true);

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://collector.test/collect');
    expect(requests[0].method).toBe('get');
    expect(requests[0].params).toEqual({ tid: '98765432', cid: '1234567890' });
    expect(requests[0].timeout).toBe(5_000);
  });

  it('reports a non-200 answer as a failure', async () => {
    const { transport } = transportReplying({
      status: 500,
      data: 'internal error',
    });

    await expect(
      transport.send('event', { cid: '1234567890' }),
    ).resolves.toBe(false);
  });

  it('treats any status other than 200 as rejected', async () => {
    const { transport } = transportReplying({ status: 204 });

    await expect(
      transport.send('event', { cid: '1234567890' }),
    ).resolves.toBe(false);
  });

  it('reports a timeout as a failure', async () => {
    const { transport } = transportReplying({
      error: new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'),
    });

    await expect(
      transport.send('ecommerce_purchase', { cid: '1234567890' }),
    ).resolves.toBe(false);
  });

  it('reports a network error as a failure', async () => {
    const { transport } = transportReplying({
      error: new Error('socket hang up'),
    });

    await expect(
      transport.send('pageview', { cid: '1234567890' }),
    ).resolves.toBe(false);
  });
});
