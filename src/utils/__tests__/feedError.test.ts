import { AxiosError, AxiosHeaders } from 'axios';
import { classifyRequestError, describeFeedError, malformedPayload } from '../feedError';

const buildAxiosError = (
  options: { status?: number; headers?: Record<string, string>; code?: string; message?: string } = {},
): AxiosError => {
  const config = { headers: new AxiosHeaders() };
  const response = options.status === undefined
    ? undefined
    : {
      data: {},
      status: options.status,
      statusText: '',
      headers: options.headers ?? {},
      config,
    };
  return new AxiosError(options.message ?? 'Request failed', options.code, config, undefined, response);
};

describe('classifyRequestError', () => {
  it('reads retry-after on a 429', () => {
    expect(classifyRequestError(buildAxiosError({ status: 429, headers: { 'retry-after': '120' } }))).toEqual({
      kind: 'rate_limited',
      message: 'Upstream feed rate limited',
      status: 429,
      retryAfterSeconds: 120,
    });
  });

  it('falls back to the OpenSky retry header', () => {
    const feedError = classifyRequestError(buildAxiosError({
      status: 429,
      headers: { 'x-rate-limit-retry-after-seconds': '45' },
    }));
    expect(feedError.retryAfterSeconds).toBe(45);
  });

  it('leaves retryAfterSeconds null when no header is usable', () => {
    const feedError = classifyRequestError(buildAxiosError({ status: 429, headers: { 'retry-after': 'soon' } }));
    expect(feedError.kind).toBe('rate_limited');
    expect(feedError.retryAfterSeconds).toBeNull();
  });

  it('classifies other statuses as http errors', () => {
    expect(classifyRequestError(buildAxiosError({ status: 503 }))).toEqual({
      kind: 'http',
      message: 'Upstream feed returned HTTP 503',
      status: 503,
    });
  });

  it('classifies aborted requests as timeouts', () => {
    expect(classifyRequestError(buildAxiosError({
      code: 'ECONNABORTED',
      message: 'timeout of 5000ms exceeded',
    }))).toEqual({ kind: 'timeout', message: 'timeout of 5000ms exceeded' });
  });

  it('classifies connection failures as transport errors', () => {
    expect(classifyRequestError(buildAxiosError({
      code: 'ECONNREFUSED',
      message: 'connect ECONNREFUSED 127.0.0.1:443',
    }))).toEqual({ kind: 'transport', message: 'connect ECONNREFUSED 127.0.0.1:443' });
  });

  it('classifies anything else as a transport error', () => {
    expect(classifyRequestError(new Error('socket hang up'))).toEqual({ kind: 'transport', message: 'socket hang up' });
    expect(classifyRequestError('boom')).toEqual({ kind: 'transport', message: 'boom' });
  });
});

describe('describeFeedError', () => {
  it('includes the status when there is one', () => {
    expect(describeFeedError({ kind: 'http', message: 'x', status: 502 })).toBe('http (502)');
    expect(describeFeedError(malformedPayload('bad body'))).toBe('malformed');
  });
});
