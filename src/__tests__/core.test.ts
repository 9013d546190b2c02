import type { AirtableClientOptions } from '@/types'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  AirtableCoreClient,
  MAX_RECORDS_PER_BATCH,
  META_LIMITER_KEY,
} from '@/client/core'
import { resolveClientOptions } from '@/config'
import { AirtableConnectionError, AirtableError } from '@/errors'

function jsonResponse(status: number, body: unknown, extraHeaders?: Record<string, string>) {
  const headers = new Headers({
    'Content-Type': 'application/json',
    ...(extraHeaders || {}),
  })
  return new Response(JSON.stringify(body), { status, headers })
}

function makeCore(options: AirtableClientOptions = {}) {
  const fetchMock = vi.fn<typeof fetch>()
  const core = new AirtableCoreClient(resolveClientOptions({
    apiKey: 'test-secret',
    fetch: fetchMock,
    rateLimit: false,
    ...options,
  }, {}))
  // @ts-expect-error private
  core.sleep = vi.fn().mockResolvedValue(undefined)
  return { core, fetchMock }
}

describe('airtableCoreClient', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('exports constants', () => {
    expect(MAX_RECORDS_PER_BATCH).toBe(10)
    expect(META_LIMITER_KEY).toBe('meta')
  })

  it('keeps resolved options', () => {
    const { core, fetchMock } = makeCore({
      endpointUrl: 'https://example.com',
      maxRetries: 7,
      retryInitialDelayMs: 250,
      retryOnStatuses: [429, 500],
    })

    expect(core.apiKey).toBe('test-secret')
    expect(core.endpointUrl).toBe('https://example.com')
    expect(core.fetchImpl).toBe(fetchMock)
    expect(core.maxRetries).toBe(7)
    expect(core.retryInitialDelayMs).toBe(250)
    expect(core.retryOnStatuses).toEqual([429, 500])
    expect(core.authHeaders).toEqual({ Authorization: 'Bearer test-secret' })
  })

  it('buildTableUrl builds table and record URLs with optional query', () => {
    const { core } = makeCore()

    const urlNoQuery = core.buildTableUrl('appBase', 'Tasks')
    expect(urlNoQuery.toString()).toBe('https://api.airtable.com/v0/appBase/Tasks')

    const params = new URLSearchParams()
    params.set('view', 'Grid view')

    const urlWithRecord = core.buildTableUrl('appBase', 'My Tasks', 'rec123', params)
    expect(urlWithRecord.pathname).toBe('/v0/appBase/My%20Tasks/rec123')
    expect(urlWithRecord.searchParams.get('view')).toBe('Grid view')

    const urlEmptyQuery = core.buildTableUrl('appBase', 'Tasks', undefined, new URLSearchParams())
    expect(urlEmptyQuery.search).toBe('')
  })

  it('buildMetaUrl builds /v0/meta URLs and normalizes the path', () => {
    const { core } = makeCore()

    expect(core.buildMetaUrl('/bases').pathname).toBe('/v0/meta/bases')
    expect(core.buildMetaUrl('bases').pathname).toBe('/v0/meta/bases')

    const search = new URLSearchParams()
    search.set('offset', 'abc')
    expect(core.buildMetaUrl('/bases', search).searchParams.get('offset')).toBe('abc')
  })

  it('buildListQuery returns undefined when no params and builds full query otherwise', () => {
    const { core } = makeCore()

    expect(core.buildListQuery()).toBeUndefined()

    const search = core.buildListQuery({
      maxRecords: 100,
      pageSize: 50,
      offset: 'off',
      view: 'Grid',
      fields: ['Name', 'Status'],
      filterByFormula: 'Status="Todo"',
      sort: [{ field: 'Name', direction: 'asc' }, { field: 'Due' }],
      cellFormat: 'json',
      timeZone: 'UTC',
      userLocale: 'en',
      returnFieldsByFieldId: true,
    })

    expect(search?.get('maxRecords')).toBe('100')
    expect(search?.get('pageSize')).toBe('50')
    expect(search?.get('offset')).toBe('off')
    expect(search?.get('view')).toBe('Grid')
    expect(search?.get('filterByFormula')).toBe('Status="Todo"')
    expect(search?.get('cellFormat')).toBe('json')
    expect(search?.get('timeZone')).toBe('UTC')
    expect(search?.get('userLocale')).toBe('en')
    expect(search?.get('returnFieldsByFieldId')).toBe('true')
    expect(search?.getAll('fields[]')).toEqual(['Name', 'Status'])
    expect(search?.get('sort[0][field]')).toBe('Name')
    expect(search?.get('sort[0][direction]')).toBe('asc')
    expect(search?.get('sort[1][field]')).toBe('Due')
    expect(search?.has('sort[1][direction]')).toBe(false)
  })

  it('buildGetQuery and buildReturnFieldsQuery', () => {
    const { core } = makeCore()

    expect(core.buildGetQuery()).toBeUndefined()
    const search = core.buildGetQuery({
      cellFormat: 'string',
      timeZone: 'Europe/Paris',
      userLocale: 'fr',
      returnFieldsByFieldId: false,
    })
    expect(search?.toString()).toBe(
      'cellFormat=string&timeZone=Europe%2FParis&userLocale=fr&returnFieldsByFieldId=false',
    )

    expect(core.buildReturnFieldsQuery(undefined)).toBeUndefined()
    expect(core.buildReturnFieldsQuery(true)?.get('returnFieldsByFieldId')).toBe('true')
  })

  it('requestJson sends auth, version, custom and request headers', async () => {
    const { core, fetchMock } = makeCore({ customHeaders: { 'X-Trace': 1, 'X-Source': 'sync' } })
    fetchMock.mockResolvedValue(jsonResponse(200, { ok: true }))

    const url = new URL('https://example.com/api')
    const result = await core.requestJson<{ ok: boolean }>(url, {
      method: 'POST',
      headers: { 'x-source': 'override' },
      body: JSON.stringify({ foo: 'bar' }),
    })

    expect(result).toEqual({ ok: true })
    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [calledUrl, init] = fetchMock.mock.calls[0]
    expect(calledUrl).toBe('https://example.com/api')
    expect(init?.method).toBe('POST')
    expect(init?.signal).toBeInstanceOf(AbortSignal)
    expect(init?.headers).toEqual({
      'Authorization': 'Bearer test-secret',
      'X-Airtable-API-Version': 'v0',
      'X-Trace': '1',
      'X-Source': 'override',
      'Content-Type': 'application/json',
    })
  })

  it('requestJson does not add Content-Type to GET or override an existing one', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock.mockImplementation(async () => jsonResponse(200, {}))

    await core.requestJson(new URL('https://example.com/a'), { method: 'GET' })
    await core.requestJson(new URL('https://example.com/b'), {
      method: 'PUT',
      headers: [['Content-Type', 'text/plain']],
      body: 'raw',
    })

    expect(fetchMock.mock.calls[0][1]?.headers).not.toHaveProperty('Content-Type')
    expect(fetchMock.mock.calls[1][1]?.headers).toHaveProperty('Content-Type', 'text/plain')
  })

  it('requestJson reads request headers given as a Headers object', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock.mockImplementation(async () => jsonResponse(200, {}))

    await core.requestJson(new URL('https://example.com'), {
      method: 'POST',
      headers: new Headers({ 'Content-Type': 'text/csv', 'X-Trace': 'abc' }),
      body: 'a,b',
    })

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      'Authorization': 'Bearer test-secret',
      'X-Airtable-API-Version': 'v0',
      'content-type': 'text/csv',
      'x-trace': 'abc',
    })
  })

  it('handleResponse returns undefined for 204 and text for non-JSON bodies', async () => {
    const { core } = makeCore()

    // @ts-expect-error testing private method
    expect(await core.handleResponse(new Response(null, { status: 204 }))).toBeUndefined()

    const text = new Response('hello', {
      status: 200,
      headers: new Headers({ 'Content-Type': 'text/plain' }),
    })
    // @ts-expect-error testing private method
    expect(await core.handleResponse(text)).toBe('hello')
  })

  it('non-retryable errors throw AirtableError with the payload', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock.mockResolvedValue(jsonResponse(422, {
      error: { type: 'INVALID_REQUEST_UNKNOWN', message: 'Invalid request' },
    }))

    const promise = core.requestJson(new URL('https://example.com'), { method: 'GET' })
    await expect(promise).rejects.toBeInstanceOf(AirtableError)
    await expect(promise).rejects.toMatchObject({
      status: 422,
      type: 'INVALID_REQUEST_UNKNOWN',
      message: 'Invalid request',
    })
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('a single 429 is retried once after the Retry-After delay', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock
      .mockResolvedValueOnce(jsonResponse(429, { errors: [] }, { 'Retry-After': '30' }))
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }))

    const result = await core.requestJson(new URL('https://example.com'), { method: 'GET' })

    expect(result).toEqual({ ok: true })
    expect(fetchMock).toHaveBeenCalledTimes(2)
    // @ts-expect-error private
    expect(core.sleep).toHaveBeenCalledTimes(1)
    // @ts-expect-error private
    expect(core.sleep).toHaveBeenCalledWith(30_000)
  })

  it('a 429 without Retry-After waits the backoff delay', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0)
    const { core, fetchMock } = makeCore({ retryInitialDelayMs: 100 })
    fetchMock
      .mockResolvedValueOnce(jsonResponse(429, {}))
      .mockResolvedValueOnce(jsonResponse(429, {}))
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }))

    await core.requestJson(new URL('https://example.com'), { method: 'GET' })

    // @ts-expect-error private
    expect(core.sleep.mock.calls).toEqual([[100], [200]])
  })

  it('noRetryIfRateLimited surfaces the first 429', async () => {
    const { core, fetchMock } = makeCore({ noRetryIfRateLimited: true })
    fetchMock.mockResolvedValue(jsonResponse(429, { error: 'RATE_LIMIT_REACHED' }))

    await expect(core.requestJson(new URL('https://example.com'), { method: 'GET' }))
      .rejects
      .toMatchObject({ status: 429, isRateLimited: true, type: 'RATE_LIMIT_REACHED' })
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('stops retrying after maxRetries and throws the last error', async () => {
    const { core, fetchMock } = makeCore({ maxRetries: 1 })
    fetchMock.mockImplementation(async () => jsonResponse(503, { error: { message: 'down' } }))

    await expect(core.requestJson(new URL('https://example.com'), { method: 'GET' }))
      .rejects
      .toMatchObject({ status: 503, isServerError: true, message: 'down' })
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('retries network failures and then throws AirtableConnectionError', async () => {
    const { core, fetchMock } = makeCore({ maxRetries: 2 })
    const failure = new TypeError('fetch failed')
    fetchMock.mockRejectedValue(failure)

    const promise = core.requestJson(new URL('https://example.com/x'), { method: 'GET' })
    await expect(promise).rejects.toBeInstanceOf(AirtableConnectionError)
    await expect(promise).rejects.toMatchObject({
      message: 'Airtable request to https://example.com/x failed after 3 attempt(s)',
      attempts: 3,
      cause: failure,
    })
    expect(fetchMock).toHaveBeenCalledTimes(3)
  })

  it('recovers when a network failure is followed by a response', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }))

    await expect(core.requestJson(new URL('https://example.com'), { method: 'GET' }))
      .resolves
      .toEqual({ ok: true })
  })

  it('limiterFor creates one limiter per base and none when pacing is off', () => {
    const { core: paced } = makeCore({ rateLimit: { requestsPerSecond: 5 } })

    const a = paced.limiterFor('appA')
    expect(a).toBeDefined()
    expect(paced.limiterFor('appA')).toBe(a)
    expect(paced.limiterFor('appB')).not.toBe(a)
    expect(paced.limiterFor()).toBe(paced.limiterFor(META_LIMITER_KEY))

    const { core: unpaced } = makeCore({ rateLimit: false })
    expect(unpaced.limiterFor('appA')).toBeUndefined()
  })

  it('paces requests of one base by 1000 / requestsPerSecond and leaves other bases alone', async () => {
    const { core, fetchMock } = makeCore({ rateLimit: { requestsPerSecond: 5 } })
    const started = new Map<string, number>()
    fetchMock.mockImplementation(async (input) => {
      started.set(String(input), Date.now())
      return jsonResponse(200, { ok: true })
    })

    const results = await Promise.all([
      core.requestJson(new URL('https://example.com/a1'), { method: 'GET' }, { baseId: 'appA' }),
      core.requestJson(new URL('https://example.com/a2'), { method: 'GET' }, { baseId: 'appA' }),
      core.requestJson(new URL('https://example.com/a3'), { method: 'GET' }, { baseId: 'appA' }),
      core.requestJson(new URL('https://example.com/b1'), { method: 'GET' }, { baseId: 'appB' }),
    ])

    expect(results).toHaveLength(4)
    const at = (path: string) => started.get(`https://example.com/${path}`) ?? Number.NaN
    expect(at('a2') - at('a1')).toBeGreaterThanOrEqual(190)
    expect(at('a3') - at('a2')).toBeGreaterThanOrEqual(190)
    expect(Math.abs(at('b1') - at('a1'))).toBeLessThan(150)
  })

  it('a 500 is surfaced after one attempt with the default statuses', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock.mockImplementation(async () => jsonResponse(500, { error: { message: 'boom' } }))

    await expect(core.requestJson(new URL('https://example.com'), { method: 'POST', body: '{}' }))
      .rejects
      .toMatchObject({ status: 500, message: 'boom' })
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('keeps the caller\'s abort signal alongside the timeout', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock.mockImplementation(async () => jsonResponse(200, { ok: true }))
    const controller = new AbortController()
    controller.abort()

    await core.requestJson(new URL('https://example.com'), { method: 'GET', signal: controller.signal })

    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true)
  })

  it('attempts without a caller signal still get a live timeout signal', async () => {
    const { core, fetchMock } = makeCore()
    fetchMock.mockImplementation(async () => jsonResponse(200, { ok: true }))

    await core.requestJson(new URL('https://example.com'), { method: 'GET' })

    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(false)
  })
})
