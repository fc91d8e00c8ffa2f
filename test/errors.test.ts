import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  RemoteCallError,
  ServiceUnavailableError,
  abortable,
  isCancellation,
  sleep,
} from '../src/core/errors';

describe('RemoteCallError', () => {
  it.each([
    [408, true],
    [429, true],
    [500, true],
    [503, true],
    [400, false],
    [404, false],
  ])('HTTP %i transient: %s', (status, transient) => {
    expect(new RemoteCallError('http://weather.test', status, 'status').transient).toBe(transient);
  });
});

describe('ServiceUnavailableError', () => {
  it('describes why the service is unavailable', () => {
    expect(new ServiceUnavailableError('weatherservice', 'circuit-open', 0).message).toBe(
      'weatherservice is unavailable: circuit is open'
    );
    expect(new ServiceUnavailableError('weatherservice', 'retries-exhausted', 3).message).toBe(
      'weatherservice is unavailable after 3 attempts'
    );
  });
});

describe('cancellation helpers', () => {
  it('recognises CancelledError and AbortError', () => {
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';

    expect(isCancellation(new CancelledError())).toBe(true);
    expect(isCancellation(abortError)).toBe(true);
    expect(isCancellation(new Error('boom'))).toBe(false);
  });

  it('abandons a promise when the signal fires', async () => {
    const controller = new AbortController();
    const pending = abortable(new Promise<string>(() => undefined), controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('passes results through while the signal is quiet', async () => {
    await expect(abortable(Promise.resolve('done'), new AbortController().signal)).resolves.toBe('done');
  });

  it('wakes a sleep early on cancellation', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
