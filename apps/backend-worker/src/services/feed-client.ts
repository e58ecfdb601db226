import type { FeedResponse, FeedTransport } from '@app/reconciler';

export type HttpFeedTransportOptions = Readonly<{
  url: URL;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}>;

/**
 * GETs the warehouse feed. The request aborts after `timeoutMs` or when the caller's signal
 * fires; status handling is left to the ingestor.
 */
export function createHttpFeedTransport(options: HttpFeedTransportOptions): FeedTransport {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async fetch(signal?: AbortSignal): Promise<FeedResponse> {
      const timeout = AbortSignal.timeout(options.timeoutMs);
      const response = await fetchImpl(options.url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      return { status: response.status, body: await response.text() };
    },
  };
}
