import type {CallerIdentity, DataScopePredicate} from './contracts'

export const buildDataScope = (
  identity: CallerIdentity,
  entity: string,
  scopeColumn: string
): DataScopePredicate => {
  if (identity.is_admin) {
    return {kind: 'all'}
  }

  const values = [...new Set(identity.scope_ids)]
  if (values.length === 0) {
    return {kind: 'none'}
  }

  return {kind: 'any_of', entity, column: scopeColumn, values}
}

export const describeDataScope = (predicate: DataScopePredicate) => {
  switch (predicate.kind) {
    case 'all':
      return 'all rows'
    case 'none':
      return 'no rows'
    case 'any_of':
      return `${predicate.entity}.${predicate.column} in (${predicate.values.join(', ')})`
  }
}

/** In-memory evaluation for ports that hold their rows in process. */
export const isVisibleUnderScope = (predicate: DataScopePredicate, scopeValue: string) => {
  switch (predicate.kind) {
    case 'all':
      return true
    case 'none':
      return false
    case 'any_of':
      return predicate.values.includes(scopeValue)
  }
}
