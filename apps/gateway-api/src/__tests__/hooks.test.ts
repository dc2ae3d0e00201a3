import {describe, expect, it, vi} from 'vitest'

import type {Body} from '@relaygate/forwarder'
import {createNoopLogger} from '@relaygate/logging'
import type {CallerIdentity, DataScopePredicate} from '@relaygate/policy-engine'

import {
  createBuiltinHook,
  createFilterVisibleItemsHook,
  createHookRegistry,
  createRequireOwnerMetadataHook,
  createRequireScopeIdsHook,
  type HookContext
} from '../hooks'
import {createInMemoryScopeStore} from '../scopeStore'

const identity = (overrides: Partial<CallerIdentity> = {}): CallerIdentity => ({
  user_id: 'user-1',
  permissions: [],
  roles: [],
  is_admin: false,
  scope_ids: ['team-a'],
  ...overrides
})

const context = ({
  payload,
  caller = identity(),
  dataScope = {kind: 'any_of', entity: 'datasets', column: 'scope_id', values: ['team-a']}
}: {
  payload: Body
  caller?: CallerIdentity
  dataScope?: DataScopePredicate
}): HookContext => ({
  sub_path: '/datasets',
  request: {method: 'GET', query: {}, headers: {}},
  identity: caller,
  data_scope: dataScope,
  scope_entity: 'datasets',
  payload
})

const scopeStore = createInMemoryScopeStore([
  {entity: 'datasets', id: 'ds-1', scope_id: 'team-a'},
  {entity: 'datasets', id: 'ds-2', scope_id: 'team-b'},
  {entity: 'datasets', id: '3', scope_id: 'team-a'},
  {entity: 'dialogs', id: 'dlg-1', scope_id: 'team-a'}
])

describe('hook registry', () => {
  const owner = createRequireOwnerMetadataHook({name: 'owner', type: 'require_owner_metadata'})
  const visible = createFilterVisibleItemsHook({
    definition: {name: 'visible', type: 'filter_visible_items', id_field: 'id'},
    scopeStore
  })

  it('resolves hooks by kind in the order given', () => {
    const registry = createHookRegistry([owner, visible])

    expect(registry.resolvePre(['owner'])).toEqual([owner])
    expect(registry.resolvePost(['visible'])).toEqual([visible])
    expect(registry.resolvePre([])).toEqual([])
  })

  it('rejects unknown names, wrong kinds and duplicates', () => {
    const registry = createHookRegistry([owner, visible])

    expect(() => registry.resolvePre(['visible'])).toThrow('Hook visible is a post-processor')
    expect(() => registry.resolvePost(['owner'])).toThrow('Hook owner is a pre-processor')
    expect(() => registry.resolvePost(['ghost'])).toThrow('Unknown hook: ghost')
    expect(() => createHookRegistry([owner, owner])).toThrow('Duplicate hook: owner')
  })

  it('builds hooks from their definitions', () => {
    const hook = createBuiltinHook({
      definition: {name: 'scopes', type: 'require_scope_ids', field: 'scope_ids'},
      scopeStore
    })

    expect(hook.kind).toBe('pre')
    expect(hook.name).toBe('scopes')
  })
})

describe('require_owner_metadata', () => {
  const hook = createRequireOwnerMetadataHook({name: 'owner', type: 'require_owner_metadata'})

  it('passes when the metadata names the caller', async () => {
    const payload: Body = {kind: 'json', value: {name: 'kb', metadata: {user_id: 'user-1'}}}

    await expect(hook.run(context({payload}))).resolves.toEqual({ok: true, payload})
  })

  it('rejects a mismatched or missing owner', async () => {
    const result = await hook.run(context({payload: {kind: 'json', value: {metadata: {user_id: 'user-2'}}}}))

    expect(result).toEqual({
      ok: false,
      error: {code: 'owner_metadata_mismatch', message: 'metadata.user_id must match the calling user', status: 400}
    })
  })

  it('rejects bodies that are not JSON objects', async () => {
    const result = await hook.run(context({payload: {kind: 'json', value: ['not', 'an', 'object']}}))

    expect(result).toEqual({
      ok: false,
      error: {code: 'body_invalid', message: 'Request body must be a JSON object', status: 400}
    })
  })
})

describe('require_scope_ids', () => {
  const hook = createRequireScopeIdsHook({name: 'scopes', type: 'require_scope_ids', field: 'target.scope_ids'})

  it('passes granted scopes given as a list or a single string', async () => {
    const listPayload: Body = {kind: 'json', value: {target: {scope_ids: ['team-a']}}}
    const singlePayload: Body = {kind: 'json', value: {target: {scope_ids: 'team-a'}}}

    await expect(hook.run(context({payload: listPayload}))).resolves.toEqual({ok: true, payload: listPayload})
    await expect(hook.run(context({payload: singlePayload}))).resolves.toEqual({ok: true, payload: singlePayload})
  })

  it('denies the first scope the caller does not hold', async () => {
    const result = await hook.run(context({payload: {kind: 'json', value: {target: {scope_ids: ['team-a', 'team-b']}}}}))

    expect(result).toEqual({
      ok: false,
      error: {code: 'scope_denied', message: 'Scope team-b is not granted to the caller', status: 403}
    })
  })

  it('lets administrators request any scope', async () => {
    const payload: Body = {kind: 'json', value: {target: {scope_ids: ['team-z']}}}

    await expect(hook.run(context({payload, caller: identity({is_admin: true})}))).resolves.toEqual({
      ok: true,
      payload
    })
  })

  it('rejects a field of the wrong type', async () => {
    const result = await hook.run(context({payload: {kind: 'json', value: {target: {scope_ids: 7}}}}))

    expect(result).toEqual({
      ok: false,
      error: {code: 'body_invalid', message: 'target.scope_ids must be a string or a list of strings', status: 400}
    })
  })
})

describe('filter_visible_items', () => {
  it('keeps only visible items and rewrites the total', async () => {
    const hook = createFilterVisibleItemsHook({
      definition: {
        name: 'visible',
        type: 'filter_visible_items',
        items_path: 'data.docs',
        id_field: 'id',
        total_path: 'data.total'
      },
      scopeStore
    })

    const result = await hook.run(
      context({
        payload: {
          kind: 'json',
          value: {code: 0, data: {docs: [{id: 'ds-1'}, {id: 'ds-2'}, {id: 3}, {name: 'no id'}], total: 4}}
        }
      })
    )

    expect(result).toEqual({
      ok: true,
      payload: {kind: 'json', value: {code: 0, data: {docs: [{id: 'ds-1'}, {id: 3}], total: 2}}}
    })
  })

  it('empties the list for callers without scopes', async () => {
    const hook = createFilterVisibleItemsHook({
      definition: {name: 'visible', type: 'filter_visible_items', id_field: 'id'},
      scopeStore
    })

    const result = await hook.run(
      context({payload: {kind: 'json', value: [{id: 'ds-1'}]}, dataScope: {kind: 'none'}})
    )

    expect(result).toEqual({ok: true, payload: {kind: 'json', value: []}})
  })

  it('queries the entity named by the hook over the mount entity', async () => {
    const hook = createFilterVisibleItemsHook({
      definition: {name: 'visible', type: 'filter_visible_items', entity: 'dialogs', id_field: 'id'},
      scopeStore
    })

    const result = await hook.run(context({payload: {kind: 'json', value: [{id: 'dlg-1'}, {id: 'ds-1'}]}}))

    expect(result).toEqual({ok: true, payload: {kind: 'json', value: [{id: 'dlg-1'}]}})
  })

  it('leaves payloads untouched for administrators', async () => {
    const hook = createFilterVisibleItemsHook({
      definition: {name: 'visible', type: 'filter_visible_items', id_field: 'id'},
      scopeStore
    })
    const payload: Body = {kind: 'json', value: [{id: 'ds-2'}]}

    await expect(hook.run(context({payload, dataScope: {kind: 'all'}}))).resolves.toEqual({ok: true, payload})
  })

  it('passes and warns when the payload has another shape', async () => {
    const logger = {...createNoopLogger(), warn: vi.fn()}
    const hook = createFilterVisibleItemsHook({
      definition: {name: 'visible', type: 'filter_visible_items', items_path: 'data', id_field: 'id'},
      scopeStore,
      logger
    })
    const payload: Body = {kind: 'raw', bytes: Buffer.from('plain text')}

    await expect(hook.run(context({payload}))).resolves.toEqual({ok: true, payload})
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({event: 'hook.payload.unexpected', reason_code: 'payload_shape_mismatch'})
    )
  })
})
