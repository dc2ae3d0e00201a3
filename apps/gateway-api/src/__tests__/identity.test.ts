import type {IncomingMessage} from 'node:http'

import {describe, expect, it} from 'vitest'

import {createStaticIdentityResolver, hashCallerToken, parseBearerToken} from '../identity'

const requestWith = (authorization?: string) =>
  ({headers: authorization === undefined ? {} : {authorization}}) as unknown as IncomingMessage

describe('static identity resolver', () => {
  const resolver = createStaticIdentityResolver([
    {
      token_sha256: hashCallerToken('test-token-alice'),
      identity: {user_id: 'alice', permissions: ['kb:read'], roles: [], is_admin: false, scope_ids: ['team-a']}
    }
  ])

  it('hashes tokens as lower-case hex SHA-256', () => {
    expect(hashCallerToken('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad')
  })

  it('extracts bearer tokens case-insensitively', () => {
    expect(parseBearerToken(requestWith('bearer  test-token '))).toBe('test-token')
    expect(parseBearerToken(requestWith('Basic dGVzdA=='))).toBeNull()
    expect(parseBearerToken(requestWith())).toBeNull()
  })

  it('resolves a known token to its identity', async () => {
    await expect(resolver(requestWith('Bearer test-token-alice'))).resolves.toMatchObject({
      user_id: 'alice',
      scope_ids: ['team-a']
    })
  })

  it('returns null for unknown or missing tokens', async () => {
    await expect(resolver(requestWith('Bearer test-token-bob'))).resolves.toBeNull()
    await expect(resolver(requestWith())).resolves.toBeNull()
  })
})
