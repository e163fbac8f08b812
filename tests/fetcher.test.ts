import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { FetchError, InvalidParametersError, RateLimitExceededError } from '../src/server/intra/errors.js'
import { LocationFetcher, parseRetryAfter, type LocationFetcherOptions } from '../src/server/intra/fetcher.js'
import {
  TEST_BASE_URL,
  TEST_CREDENTIALS,
  createIntraStub,
  jsonResponse,
  makeLocations,
  quietLogger,
  type StubCall,
  type StubHandler
} from './utils/intraStub.js'

const since = new Date('2024-01-01T00:00:00Z')
const until = new Date('2024-01-16T00:00:00Z')
const fixedNow = () => until

const pageOf = (call: StubCall) => Number(call.url.searchParams.get('page[number]'))

function setup(handler: StubHandler, overrides: Partial<LocationFetcherOptions> = {}) {
  const stub = createIntraStub(handler)
  const sleeps: number[] = []
  const fetcher = new LocationFetcher({
    baseUrl: TEST_BASE_URL,
    credentials: TEST_CREDENTIALS,
    pageSize: 2,
    requestIntervalMs: 0,
    fetch: stub.fetch,
    sleep: async (ms) => {
      sleeps.push(ms)
    },
    now: fixedNow,
    logger: quietLogger,
    ...overrides
  })
  return { stub, sleeps, fetcher }
}

describe('LocationFetcher', () => {
  it('pages until a short page', async () => {
    const { stub, fetcher } = setup((call) =>
      jsonResponse(pageOf(call) === 1 ? makeLocations(2) : makeLocations(1, 2))
    )

    const result = await fetcher.fetch(9, since, until)

    assert.equal(result.sessions.length, 3)
    assert.equal(result.pages, 2)
    assert.equal(result.dropped, 0)
    assert.equal(result.fetchCutoff, until)
    assert.deepEqual(
      result.sessions.map((session) => session.host),
      ['c1r1p1', 'c1r1p2', 'c1r1p3']
    )
    assert.deepEqual(stub.pageNumbers(), [1, 2])
    assert.equal(stub.tokenCalls().length, 1)
    assert.deepEqual(
      stub.pageCalls().map((call) => call.authorization),
      ['Bearer token-1', 'Bearer token-1']
    )
  })

  it('requests the campus locations endpoint with range and sort', async () => {
    const { stub, fetcher } = setup(() => jsonResponse([]))

    const result = await fetcher.fetch(9, since, until)

    const [call] = stub.pageCalls()
    assert.equal(call.url.origin + call.url.pathname, 'https://intra.test/v2/campus/9/locations')
    assert.equal(call.url.searchParams.get('page[size]'), '2')
    assert.equal(call.url.searchParams.get('page[number]'), '1')
    assert.equal(call.url.searchParams.get('range[begin_at]'), '2024-01-01T00:00:00.000Z,2024-01-16T00:00:00.000Z')
    assert.equal(call.url.searchParams.get('sort'), 'begin_at')
    assert.deepEqual(result.sessions, [])
    assert.equal(result.pages, 1)
  })

  it('refreshes the token once on a 401 and retries the page', async () => {
    let rejected = false
    const { stub, fetcher } = setup((call) => {
      const page = pageOf(call)
      if (page === 3 && !rejected) {
        rejected = true
        return new Response(null, { status: 401 })
      }
      return jsonResponse(page < 3 ? makeLocations(2, (page - 1) * 2) : makeLocations(1, 4))
    })

    const result = await fetcher.fetch(9, since, until)

    assert.equal(result.sessions.length, 5)
    assert.deepEqual(stub.pageNumbers(), [1, 2, 3, 3])
    assert.equal(stub.tokenCalls().length, 2)
    assert.equal(stub.pageCalls()[3].authorization, 'Bearer token-2')
  })

  it('gives up after a second 401 on the same page', async () => {
    const { stub, fetcher } = setup(() => new Response(null, { status: 401 }))

    await assert.rejects(fetcher.fetch(9, since, until), {
      name: 'AuthenticationError',
      code: 'AUTHENTICATION_FAILED'
    })
    assert.equal(stub.tokenCalls().length, 2)
    assert.deepEqual(stub.pageNumbers(), [1, 1])
  })

  it('waits for Retry-After on a 429', async () => {
    let limited = false
    const { stub, sleeps, fetcher } = setup(() => {
      if (!limited) {
        limited = true
        return new Response(null, { status: 429, headers: { 'Retry-After': '2' } })
      }
      return jsonResponse(makeLocations(1))
    })

    const result = await fetcher.fetch(9, since, until)

    assert.equal(result.sessions.length, 1)
    assert.deepEqual(sleeps, [2000])
    assert.deepEqual(stub.pageNumbers(), [1, 1])
  })

  it('releases the bodies of responses it retries', async () => {
    let cancelled = 0
    const unreadBody = () =>
      new ReadableStream({
        cancel() {
          cancelled++
        }
      })
    let attempt = 0
    const { fetcher } = setup(() => {
      attempt++
      if (attempt === 1) return new Response(unreadBody(), { status: 429 })
      if (attempt === 2) return new Response(unreadBody(), { status: 401 })
      return jsonResponse(makeLocations(1))
    })

    const result = await fetcher.fetch(9, since, until)

    assert.equal(result.sessions.length, 1)
    assert.equal(cancelled, 2)
  })

  it('fails with the page number once retries run out', async () => {
    const { sleeps, fetcher } = setup((call) =>
      pageOf(call) === 1 ? jsonResponse(makeLocations(2)) : new Response(null, { status: 429 })
    )

    await assert.rejects(fetcher.fetch(9, since, until), (error: unknown) => {
      assert.ok(error instanceof RateLimitExceededError)
      assert.equal(error.code, 'RATE_LIMIT_EXCEEDED')
      assert.equal(error.page, 2)
      assert.equal(error.attempts, 4)
      return true
    })
    assert.deepEqual(sleeps, [1000, 1000, 1000])
  })

  it('pauses between pages', async () => {
    const { sleeps, fetcher } = setup(
      (call) => jsonResponse(pageOf(call) === 1 ? makeLocations(2) : []),
      { requestIntervalMs: 500 }
    )

    await fetcher.fetch(9, since, until)

    assert.deepEqual(sleeps, [500])
  })

  it('treats a 404 as the end of the data', async () => {
    const { stub, fetcher } = setup((call) =>
      pageOf(call) === 1 ? jsonResponse(makeLocations(2)) : new Response(null, { status: 404 })
    )

    const result = await fetcher.fetch(9, since, until)

    assert.equal(result.sessions.length, 2)
    assert.equal(result.pages, 2)
    assert.deepEqual(stub.pageNumbers(), [1, 2])
  })

  it('refreshes a token about to expire between pages', async () => {
    let current = until.getTime()
    const stub = createIntraStub(
      (call) => {
        current += 30_000
        return jsonResponse(pageOf(call) < 3 ? makeLocations(2) : [])
      },
      { tokenLifetimeSeconds: 100 }
    )
    const fetcher = new LocationFetcher({
      baseUrl: TEST_BASE_URL,
      credentials: TEST_CREDENTIALS,
      pageSize: 2,
      requestIntervalMs: 0,
      fetch: stub.fetch,
      now: () => new Date(current),
      logger: quietLogger
    })

    await fetcher.fetch(9, since, until)

    assert.deepEqual(
      stub.pageCalls().map((call) => call.authorization),
      ['Bearer token-1', 'Bearer token-1', 'Bearer token-2']
    )
  })

  it('drops malformed records and counts them', async () => {
    const [valid] = makeLocations(1)
    const { fetcher } = setup(
      (call) =>
        jsonResponse(pageOf(call) === 1 ? [valid, { ...valid, host: '' }, { ...valid, begin_at: 'yesterday' }] : []),
      { pageSize: 3 }
    )

    const result = await fetcher.fetch(9, since, until)

    assert.equal(result.sessions.length, 1)
    assert.equal(result.dropped, 2)
  })

  it('validates parameters before any request', async () => {
    const { stub, fetcher } = setup(() => jsonResponse([]))

    await assert.rejects(fetcher.fetch(0, since, until), InvalidParametersError)
    await assert.rejects(fetcher.fetch(9, until, since), InvalidParametersError)
    await assert.rejects(fetcher.fetch(9, new Date(Number.NaN), until), InvalidParametersError)
    assert.equal(stub.calls.length, 0)
  })

  it('requires credentials', async () => {
    const { stub, fetcher } = setup(() => jsonResponse([]), {
      credentials: { clientId: 'test-client', clientSecret: '' }
    })

    await assert.rejects(fetcher.fetch(9, since, until), { code: 'INVALID_PARAMETERS' })
    assert.equal(stub.calls.length, 0)
  })

  it('surfaces server errors with their status', async () => {
    const { fetcher } = setup(() => new Response('oops', { status: 500 }))

    await assert.rejects(fetcher.fetch(9, since, until), (error: unknown) => {
      assert.ok(error instanceof FetchError)
      assert.equal(error.status, 500)
      assert.equal(error.code, 'FETCH_FAILED')
      assert.equal(error.aborted, false)
      return true
    })
  })

  it('rejects pages that are not lists', async () => {
    const { fetcher } = setup(() => jsonResponse({ error: 'unexpected' }))

    await assert.rejects(fetcher.fetch(9, since, until), {
      code: 'FETCH_FAILED',
      message: 'Page 1 did not contain a list of locations'
    })
  })

  it('wraps transport failures', async () => {
    const { fetcher } = setup(() => {
      throw new TypeError('socket hang up')
    })

    await assert.rejects(fetcher.fetch(9, since, until), (error: unknown) => {
      return error instanceof FetchError && error.code === 'FETCH_FAILED' && error.cause instanceof TypeError
    })
  })

  it('stops between pages once aborted', async () => {
    const controller = new AbortController()
    const { stub, fetcher } = setup(() => {
      controller.abort()
      return jsonResponse(makeLocations(2))
    })

    await assert.rejects(fetcher.fetch(9, since, until, { signal: controller.signal }), {
      code: 'FETCH_ABORTED',
      aborted: true
    })
    assert.deepEqual(stub.pageNumbers(), [1])
  })

  it('makes no request with an already aborted signal', async () => {
    const { stub, fetcher } = setup(() => jsonResponse([]))

    await assert.rejects(fetcher.fetch(9, since, until, { signal: AbortSignal.abort() }), {
      code: 'FETCH_ABORTED'
    })
    assert.equal(stub.calls.length, 0)
  })
})

describe('parseRetryAfter', () => {
  const now = new Date('2024-01-15T10:00:00Z')

  it('reads delays in seconds', () => {
    assert.equal(parseRetryAfter('2', now), 2000)
    assert.equal(parseRetryAfter('0', now), 0)
  })

  it('reads HTTP dates', () => {
    assert.equal(parseRetryAfter('Mon, 15 Jan 2024 10:00:05 GMT', now), 5000)
    assert.equal(parseRetryAfter('Mon, 15 Jan 2024 09:59:00 GMT', now), 0)
  })

  it('ignores missing or unreadable values', () => {
    assert.equal(parseRetryAfter(null, now), null)
    assert.equal(parseRetryAfter('soon', now), null)
  })
})
