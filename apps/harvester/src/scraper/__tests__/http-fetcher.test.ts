import { describe, it, expect, vi, afterEach } from 'vitest'
import { HttpFetcher, computeBackoffDelay, isTransientFetchError } from '../fetch/http-fetcher.js'
import { FetchRetryExhaustedError, HttpStatusError } from '../errors.js'
import type { RetryPolicy } from '../types.js'

const URL_UNDER_TEST = 'https://catalog.example.com/iphone-15.html'

const instantRetries = (retries: number): RetryPolicy => ({
  retries,
  baseDelayMs: 0,
  jitterMaxMs: 0,
})

function connectionReset(): TypeError {
  return new TypeError('fetch failed', {
    cause: Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }),
  })
}

describe('HttpFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns the body with identifying headers and redirect following', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(4) })
    const body = await fetcher.fetchText(URL_UNDER_TEST)

    expect(body).toBe('<html>ok</html>')
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    const init = fetchSpy.mock.calls[0]?.[1]
    expect(init.headers['User-Agent']).toBe('price-monitor/1.0')
    expect(init.headers.Accept).toBe('text/html,application/xhtml+xml')
    expect(init.redirect).toBe('follow')
  })

  it('recovers after fewer transient failures than the retry budget', async () => {
    const fetchSpy = vi
      .fn()
      .mockRejectedValueOnce(connectionReset())
      .mockRejectedValueOnce(connectionReset())
      .mockResolvedValueOnce(new Response('<html>third time</html>', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(4) })

    await expect(fetcher.fetchText(URL_UNDER_TEST)).resolves.toBe('<html>third time</html>')
    expect(fetchSpy).toHaveBeenCalledTimes(3)
  })

  it('recovers when the failures use up the whole retry budget', async () => {
    const fetchSpy = vi
      .fn()
      .mockRejectedValueOnce(connectionReset())
      .mockRejectedValueOnce(connectionReset())
      .mockResolvedValueOnce(new Response('late', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(2) })

    await expect(fetcher.fetchText(URL_UNDER_TEST)).resolves.toBe('late')
    expect(fetchSpy).toHaveBeenCalledTimes(3)
  })

  it('wraps the last transient fault once retries + 1 attempts fail', async () => {
    const lastFault = connectionReset()
    const fetchSpy = vi
      .fn()
      .mockRejectedValueOnce(connectionReset())
      .mockRejectedValueOnce(connectionReset())
      .mockRejectedValueOnce(lastFault)
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(2) })
    const error = await fetcher.fetchText(URL_UNDER_TEST).catch((e: unknown) => e)

    expect(fetchSpy).toHaveBeenCalledTimes(3)
    expect(error).toBeInstanceOf(FetchRetryExhaustedError)
    if (!(error instanceof FetchRetryExhaustedError)) return
    expect(error.url).toBe(URL_UNDER_TEST)
    expect(error.retries).toBe(2)
    expect(error.cause).toBe(lastFault)
    expect(error.message).toBe(`Failed to fetch after 2 retries: ${URL_UNDER_TEST}`)
  })

  it('treats timeouts as transient', async () => {
    const timeout = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })
    const fetchSpy = vi
      .fn()
      .mockRejectedValueOnce(timeout)
      .mockResolvedValueOnce(new Response('ok', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(1) })

    await expect(fetcher.fetchText(URL_UNDER_TEST)).resolves.toBe('ok')
    expect(fetchSpy).toHaveBeenCalledTimes(2)
  })

  it('does not retry HTTP error statuses', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(4) })
    const error = await fetcher.fetchText(URL_UNDER_TEST).catch((e: unknown) => e)

    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(error).toBeInstanceOf(HttpStatusError)
    if (!(error instanceof HttpStatusError)) return
    expect(error.statusCode).toBe(404)
    expect(error.message).toBe(`HTTP 404 Not Found: ${URL_UNDER_TEST}`)
  })

  it('cancels the unread body of an error response', async () => {
    const response = new Response('<html>server error page</html>', { status: 503, statusText: 'Service Unavailable' })
    const body = response.body
    if (!body) throw new Error('response has no body')
    const cancel = vi.spyOn(body, 'cancel')
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response))

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(4) })

    await expect(fetcher.fetchText(URL_UNDER_TEST)).rejects.toBeInstanceOf(HttpStatusError)
    expect(cancel).toHaveBeenCalledTimes(1)
  })

  it('propagates non-network errors unchanged', async () => {
    const boom = new Error('boom')
    const fetchSpy = vi.fn().mockRejectedValue(boom)
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(4) })

    await expect(fetcher.fetchText(URL_UNDER_TEST)).rejects.toBe(boom)
    expect(fetchSpy).toHaveBeenCalledTimes(1)
  })

  it('returns raw bytes from fetchBytes with an image Accept header', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValue(new Response(new Uint8Array([137, 80, 78, 71]), { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ retryPolicy: instantRetries(4) })
    const bytes = await fetcher.fetchBytes('https://catalog.example.com/images/iphone-15.png')

    expect(Buffer.isBuffer(bytes)).toBe(true)
    expect([...bytes]).toEqual([137, 80, 78, 71])
    expect(fetchSpy.mock.calls[0]?.[1].headers.Accept).toBe('image/*')
  })
})

describe('isTransientFetchError', () => {
  it('classifies network faults as transient', () => {
    expect(isTransientFetchError(connectionReset())).toBe(true)
    expect(isTransientFetchError(new TypeError('fetch failed'))).toBe(true)
    expect(isTransientFetchError(new TypeError('terminated'))).toBe(true)
    expect(isTransientFetchError(Object.assign(new Error('timeout'), { name: 'TimeoutError' }))).toBe(true)
  })

  it('classifies everything else as fatal', () => {
    expect(isTransientFetchError(new HttpStatusError(URL_UNDER_TEST, 500, 'Server Error'))).toBe(false)
    expect(isTransientFetchError(new TypeError('Failed to parse URL from nope'))).toBe(false)
    expect(
      isTransientFetchError(
        new TypeError('fetch failed', { cause: Object.assign(new Error('bad cert'), { code: 'CERT_HAS_EXPIRED' }) })
      )
    ).toBe(false)
    expect(isTransientFetchError('not an error')).toBe(false)
  })
})

describe('computeBackoffDelay', () => {
  const policy: RetryPolicy = { retries: 4, baseDelayMs: 600, jitterMaxMs: 400 }

  it('grows exponentially from the base delay', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(600)
    expect(computeBackoffDelay(1, policy, () => 0)).toBe(1200)
    expect(computeBackoffDelay(3, policy, () => 0)).toBe(4800)
  })

  it('adds jitter up to jitterMaxMs', () => {
    expect(computeBackoffDelay(2, policy, () => 0.5)).toBe(2600)
  })
})
