import {createHash, timingSafeEqual} from 'node:crypto'
import type {IncomingMessage} from 'node:http'

import type {CallerIdentity} from '@relaygate/policy-engine'

import type {CallerDefinition} from './definition'

/**
 * Maps an inbound request to the caller it acts for, or null when the caller
 * cannot be identified. Identity providers plug in here.
 */
export type IdentityResolver = (request: IncomingMessage) => Promise<CallerIdentity | null>

export const hashCallerToken = (token: string) => createHash('sha256').update(token, 'utf8').digest('hex')

export const parseBearerToken = (request: IncomingMessage) => {
  const header = request.headers.authorization
  if (!header) {
    return null
  }

  const match = /^Bearer\s+(.+)$/iu.exec(header)
  const token = match?.[1]?.trim()
  return token && token.length > 0 ? token : null
}

/** Resolves `authorization: Bearer <token>` against a table of token digests. */
export const createStaticIdentityResolver = (callers: readonly CallerDefinition[]): IdentityResolver => {
  const entries = callers.map(caller => ({
    digest: Buffer.from(caller.token_sha256, 'hex'),
    identity: caller.identity
  }))

  return async request => {
    const token = parseBearerToken(request)
    if (!token) {
      return null
    }

    const presented = Buffer.from(hashCallerToken(token), 'hex')
    const entry = entries.find(candidate => timingSafeEqual(candidate.digest, presented))
    return entry?.identity ?? null
  }
}
