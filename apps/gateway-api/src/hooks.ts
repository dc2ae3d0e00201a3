import type {Body, InboundHeaders, QueryParams} from '@relaygate/forwarder'
import {createNoopLogger, type StructuredLogger} from '@relaygate/logging'
import type {CallerIdentity, DataScopePredicate} from '@relaygate/policy-engine'

import type {HookDefinition, HookKind} from './definition'
import type {ErrorStatus} from './errors'
import type {ScopeStore} from './scopeStore'

export type HookContext = {
  sub_path: string
  request: {
    method: string
    query: QueryParams
    headers: InboundHeaders
  }
  identity: CallerIdentity
  data_scope: DataScopePredicate
  /** entity the mount's data scope applies to */
  scope_entity: string
  payload: Body
}

export type HookFailure = {
  code: string
  message: string
  status?: ErrorStatus
}

export type HookResult = {ok: true; payload: Body} | {ok: false; error: HookFailure}

export type PreHook = {kind: 'pre'; name: string; run: (context: HookContext) => Promise<HookResult>}
export type PostHook = {kind: 'post'; name: string; run: (context: HookContext) => Promise<HookResult>}
export type Hook = PreHook | PostHook

export type HookRegistry = {
  resolvePre: (names: readonly string[]) => PreHook[]
  resolvePost: (names: readonly string[]) => PostHook[]
}

const passed = (payload: Body): HookResult => ({ok: true, payload})

const failed = (error: HookFailure): HookResult => ({ok: false, error})

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string')

const splitPath = (dottedPath: string | undefined) =>
  dottedPath ? dottedPath.split('.').filter(segment => segment.length > 0) : []

const readAtPath = (value: unknown, segments: readonly string[]): unknown => {
  let current = value
  for (const segment of segments) {
    if (!isRecord(current)) {
      return undefined
    }
    current = current[segment]
  }

  return current
}

const writeAtPath = (value: unknown, segments: readonly string[], next: unknown): unknown => {
  const [head, ...rest] = segments
  if (head === undefined) {
    return next
  }

  const record = isRecord(value) ? value : {}
  return {...record, [head]: writeAtPath(record[head], rest, next)}
}

export const createHookRegistry = (hooks: readonly Hook[]): HookRegistry => {
  const preHooks = new Map<string, PreHook>()
  const postHooks = new Map<string, PostHook>()
  for (const hook of hooks) {
    if (preHooks.has(hook.name) || postHooks.has(hook.name)) {
      throw new Error(`Duplicate hook: ${hook.name}`)
    }

    if (hook.kind === 'pre') {
      preHooks.set(hook.name, hook)
    } else {
      postHooks.set(hook.name, hook)
    }
  }

  const resolve = <T extends Hook>({
    names,
    own,
    other,
    otherKind
  }: {
    names: readonly string[]
    own: ReadonlyMap<string, T>
    other: ReadonlyMap<string, Hook>
    otherKind: HookKind
  }) =>
    names.map(name => {
      const hook = own.get(name)
      if (hook) {
        return hook
      }

      throw new Error(other.has(name) ? `Hook ${name} is a ${otherKind}-processor` : `Unknown hook: ${name}`)
    })

  return {
    resolvePre: names => resolve({names, own: preHooks, other: postHooks, otherKind: 'post'}),
    resolvePost: names => resolve({names, own: postHooks, other: preHooks, otherKind: 'pre'})
  }
}

type RequireOwnerMetadata = Extract<HookDefinition, {type: 'require_owner_metadata'}>
type RequireScopeIds = Extract<HookDefinition, {type: 'require_scope_ids'}>
type FilterVisibleItems = Extract<HookDefinition, {type: 'filter_visible_items'}>

/** The JSON body must carry `metadata.user_id` equal to the caller. */
export const createRequireOwnerMetadataHook = (definition: RequireOwnerMetadata): PreHook => ({
  kind: 'pre',
  name: definition.name,
  run: async ({payload, identity}) => {
    if (payload.kind !== 'json' || !isRecord(payload.value)) {
      return failed({code: 'body_invalid', message: 'Request body must be a JSON object', status: 400})
    }

    const owner = readAtPath(payload.value, ['metadata', 'user_id'])
    if (owner !== identity.user_id) {
      return failed({
        code: 'owner_metadata_mismatch',
        message: 'metadata.user_id must match the calling user',
        status: 400
      })
    }

    return passed(payload)
  }
})

export const createRequireScopeIdsHook = (definition: RequireScopeIds): PreHook => ({
  kind: 'pre',
  name: definition.name,
  run: async ({payload, identity}) => {
    if (payload.kind !== 'json' || !isRecord(payload.value)) {
      return failed({code: 'body_invalid', message: 'Request body must be a JSON object', status: 400})
    }

    const value = readAtPath(payload.value, splitPath(definition.field))
    const requested = typeof value === 'string' ? [value] : value
    if (!isStringList(requested)) {
      return failed({
        code: 'body_invalid',
        message: `${definition.field} must be a string or a list of strings`,
        status: 400
      })
    }

    if (identity.is_admin) {
      return passed(payload)
    }

    const granted = new Set(identity.scope_ids)
    const denied = requested.find(scopeId => !granted.has(scopeId))
    if (denied !== undefined) {
      return failed({code: 'scope_denied', message: `Scope ${denied} is not granted to the caller`, status: 403})
    }

    return passed(payload)
  }
})

/**
 * Drops list entries the caller may not see. Entries without a string or
 * numeric id are dropped too; payloads of another shape pass unchanged.
 */
export const createFilterVisibleItemsHook = ({
  definition,
  scopeStore,
  logger = createNoopLogger()
}: {
  definition: FilterVisibleItems
  scopeStore: ScopeStore
  logger?: StructuredLogger
}): PostHook => {
  const itemsPath = splitPath(definition.items_path)
  const totalPath = splitPath(definition.total_path)

  return {
    kind: 'post',
    name: definition.name,
    run: async ({payload, data_scope, scope_entity}) => {
      if (data_scope.kind === 'all') {
        return passed(payload)
      }

      const items = payload.kind === 'json' ? readAtPath(payload.value, itemsPath) : undefined
      if (payload.kind !== 'json' || !Array.isArray(items)) {
        logger.warn({
          event: 'hook.payload.unexpected',
          component: 'gateway.hooks',
          message: `Hook ${definition.name} expected a JSON list at ${definition.items_path ?? '(root)'}`,
          reason_code: 'payload_shape_mismatch'
        })
        return passed(payload)
      }

      const visible =
        data_scope.kind === 'none'
          ? new Set<string>()
          : new Set(await scopeStore.listVisibleIds({entity: definition.entity ?? scope_entity, predicate: data_scope}))

      const kept = items.filter((item: unknown) => {
        const id = isRecord(item) ? item[definition.id_field] : undefined
        return (typeof id === 'string' || typeof id === 'number') && visible.has(String(id))
      })

      const filtered = writeAtPath(payload.value, itemsPath, kept)
      return passed({
        kind: 'json',
        value: totalPath.length > 0 ? writeAtPath(filtered, totalPath, kept.length) : filtered
      })
    }
  }
}

export const createBuiltinHook = ({
  definition,
  scopeStore,
  logger
}: {
  definition: HookDefinition
  scopeStore: ScopeStore
  logger?: StructuredLogger
}): Hook => {
  switch (definition.type) {
    case 'require_owner_metadata':
      return createRequireOwnerMetadataHook(definition)
    case 'require_scope_ids':
      return createRequireScopeIdsHook(definition)
    case 'filter_visible_items':
      return createFilterVisibleItemsHook({definition, scopeStore, ...(logger ? {logger} : {})})
  }
}
