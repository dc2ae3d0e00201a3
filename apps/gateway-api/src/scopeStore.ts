import {isVisibleUnderScope, type DataScopePredicate} from '@relaygate/policy-engine'

import type {ScopedItem} from './definition'

/**
 * Storage port for row visibility. Implementations translate the predicate
 * into their own query; `none` must match nothing.
 */
export type ScopeStore = {
  listVisibleIds: (input: {entity: string; predicate: DataScopePredicate}) => Promise<string[]>
}

export const createInMemoryScopeStore = (items: readonly ScopedItem[] = []): ScopeStore => ({
  listVisibleIds: async ({entity, predicate}) =>
    items
      .filter(item => item.entity === entity && isVisibleUnderScope(predicate, item.scope_id))
      .map(item => item.id)
})
