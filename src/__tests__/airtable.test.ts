import { afterEach, describe, expect, it, vi } from 'vitest'
import { Account } from '@/account'
import { Airtable } from '@/airtable'
import { Base } from '@/base'
import { resetConfig } from '@/config'
import { AirtableConfigError } from '@/errors'
import { mockFetch, requestsOf } from './mock-fetch'

const basesPage1 = {
  bases: [
    { id: 'appProjects', name: 'Projects', permissionLevel: 'create' },
    { id: 'appCrm', name: 'CRM', permissionLevel: 'read' },
  ],
  offset: 'itr1',
}

const basesPage2 = {
  bases: [{ id: 'appHiring', name: 'Hiring', permissionLevel: 'edit' }],
}

function makeAirtable(fetchMock: typeof fetch) {
  return new Airtable({ apiKey: 'test-secret', fetch: fetchMock, rateLimit: false })
}

describe('airtable', () => {
  afterEach(() => {
    resetConfig()
    vi.unstubAllEnvs()
  })

  it('exposes the api key and auth headers', () => {
    const airtable = makeAirtable(mockFetch([]))

    expect(airtable.apiKey).toBe('test-secret')
    expect(airtable.authHeaders).toEqual({ Authorization: 'Bearer test-secret' })
  })

  it('reads the api key from the environment', () => {
    vi.stubEnv('AIRTABLE_API_KEY', 'test-env-key')

    expect(new Airtable({ fetch: mockFetch([]) }).apiKey).toBe('test-env-key')
  })

  it('throws AirtableConfigError without an api key', () => {
    vi.stubEnv('AIRTABLE_API_KEY', '')

    expect(() => new Airtable({ fetch: mockFetch([]) })).toThrow(AirtableConfigError)
  })

  it('static configure sets defaults for later clients', () => {
    vi.stubEnv('AIRTABLE_API_KEY', '')
    Airtable.configure({ apiKey: 'test-global', fetch: mockFetch([]), rateLimit: false })

    expect(new Airtable().apiKey).toBe('test-global')
  })

  it('getBases walks every page and builds Base objects', async () => {
    const fetchMock = mockFetch([
      { path: '/v0/meta/bases', body: basesPage1 },
      { path: '/v0/meta/bases', body: basesPage2 },
    ])
    const airtable = makeAirtable(fetchMock)

    const bases = await airtable.getBases()

    expect(bases.map(b => b.id)).toEqual(['appProjects', 'appCrm', 'appHiring'])
    expect(bases[0]).toBeInstanceOf(Base)
    expect(bases[1].name).toBe('CRM')
    expect(bases[1].permissionLevel).toBe('read')
    expect(airtable.bases).toBe(bases)

    const requests = requestsOf(fetchMock)
    expect(requests[0].query.has('offset')).toBe(false)
    expect(requests[1].query.get('offset')).toBe('itr1')
    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'Bearer test-secret' })
  })

  it('getBase by id returns a handle without a request when nothing is loaded', async () => {
    const fetchMock = mockFetch([])
    const airtable = makeAirtable(fetchMock)

    const base = await airtable.getBase('appProjects', 'id')

    expect(base?.id).toBe('appProjects')
    expect(base?.name).toBeUndefined()
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('getBase loads bases once and looks up by name, id or either', async () => {
    const fetchMock = mockFetch([
      { path: '/v0/meta/bases', body: basesPage1 },
      { path: '/v0/meta/bases', body: basesPage2 },
    ])
    const airtable = makeAirtable(fetchMock)

    expect((await airtable.getBase('Hiring', 'name'))?.id).toBe('appHiring')
    expect((await airtable.getBase('appCrm', 'id'))?.name).toBe('CRM')
    expect((await airtable.getBase('Projects'))?.id).toBe('appProjects')
    expect((await airtable.getBase('appHiring'))?.name).toBe('Hiring')
    expect(await airtable.getBase('Projects', 'id')).toBeUndefined()
    expect(await airtable.getBase('Missing')).toBeUndefined()
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('getTable returns a table handle without a request', () => {
    const fetchMock = mockFetch([])
    const airtable = makeAirtable(fetchMock)

    const table = airtable.getTable<{ Name: string }>('appProjects', 'Tasks')

    expect(table.name).toBe('Tasks')
    expect(table.base.id).toBe('appProjects')
    expect(table.url).toBe('https://api.airtable.com/v0/appProjects/Tasks')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('getEnterpriseAccount maps the account', async () => {
    const fetchMock = mockFetch([
      {
        path: '/v0/meta/enterpriseAccounts/entAcme',
        body: {
          id: 'entAcme',
          createdTime: '2024-01-01T00:00:00.000Z',
          workspaceIds: ['wspA', 'wspB'],
          userIds: ['usrA'],
          emailDomains: [{ emailDomain: 'example.com', isSsoRequired: true }],
        },
      },
    ])
    const airtable = makeAirtable(fetchMock)

    const account = await airtable.getEnterpriseAccount('entAcme')

    expect(account).toBeInstanceOf(Account)
    expect(account.id).toBe('entAcme')
    expect(account.createdTime).toBe('2024-01-01T00:00:00.000Z')
    expect(account.workspaceIds).toEqual(['wspA', 'wspB'])
    expect(account.userIds).toEqual(['usrA'])
    expect(account.emailDomains).toEqual(['example.com'])
    expect(account.client).toBe(airtable)
  })

  it('surfaces API errors', async () => {
    const airtable = makeAirtable(mockFetch([
      { path: '/v0/meta/enterpriseAccounts/entNope', status: 403, body: { error: { type: 'NOT_AUTHORIZED', message: 'You are not authorized' } } },
    ]))

    await expect(airtable.getEnterpriseAccount('entNope')).rejects.toMatchObject({
      status: 403,
      type: 'NOT_AUTHORIZED',
      message: 'You are not authorized',
    })
  })
})
