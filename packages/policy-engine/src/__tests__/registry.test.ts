import {describe, expect, it} from 'vitest'

import {createRuleRegistry, type RuleInput, type RuleRegistry} from '../index'

const buildRegistry = (rules: RuleInput[]): RuleRegistry => {
  const result = createRuleRegistry(rules)
  if (!result.ok) {
    throw new Error(result.message)
  }

  return result.registry
}

const threadRules: RuleInput[] = [
  {rule_id: 'threads.create', path_pattern: '\\/threads', method: 'POST', straightforward: true},
  {rule_id: 'threads.search', path_pattern: '\\/threads/search', method: 'POST', straightforward: true},
  {rule_id: 'runs.create', path_pattern: '\\/threads\\/.*\\/runs', method: 'POST', straightforward: true},
  {
    rule_id: 'runs.stream',
    path_pattern: '\\/threads\\/.*\\/runs\\/stream',
    method: 'POST',
    straightforward: true,
    streaming: true
  },
  {rule_id: 'runs.get', path_pattern: '\\/threads\\/.*\\/runs\\/.*', method: 'GET', straightforward: true}
]

describe('createRuleRegistry', () => {
  it('selects the rule with the longest matched prefix', () => {
    const registry = buildRegistry(threadRules)

    const stream = registry.match({sub_path: '/threads/t_1/runs/stream', method: 'POST'})
    expect(stream.matched && stream.rule.rule_id).toBe('runs.stream')
    expect(stream.matched && stream.matched_length).toBe(24)

    const run = registry.match({sub_path: '/threads/t_1/runs', method: 'POST'})
    expect(run.matched && run.rule.rule_id).toBe('runs.create')

    const search = registry.match({sub_path: '/threads/search', method: 'POST'})
    expect(search.matched && search.rule.rule_id).toBe('threads.search')

    const create = registry.match({sub_path: '/threads', method: 'POST'})
    expect(create.matched && create.rule.rule_id).toBe('threads.create')
  })

  it('only considers rules whose method matches or is a wildcard', () => {
    const registry = buildRegistry([
      ...threadRules,
      {rule_id: 'threads.any', path_pattern: '/threads/t_1/state', method: '*'}
    ])

    const getRun = registry.match({sub_path: '/threads/t_1/runs/r_1', method: 'get'})
    expect(getRun.matched && getRun.rule.rule_id).toBe('runs.get')

    const deleteState = registry.match({sub_path: '/threads/t_1/state', method: 'DELETE'})
    expect(deleteState.matched && deleteState.rule.rule_id).toBe('threads.any')

    expect(registry.match({sub_path: '/threads/t_1', method: 'DELETE'})).toEqual({
      matched: false,
      reason_code: 'no_matching_rule'
    })
  })

  it('resolves equal-length matches to the first registered rule', () => {
    const registry = buildRegistry([
      {rule_id: 'first', path_pattern: '/v1/kb/list', method: 'POST'},
      {rule_id: 'second', path_pattern: '/v1/kb/li.t', method: 'POST'}
    ])

    const result = registry.match({sub_path: '/v1/kb/list', method: 'POST'})
    expect(result.matched && result.rule.rule_id).toBe('first')
  })

  it('anchors patterns at the start of the sub-path', () => {
    const registry = buildRegistry([{rule_id: 'kb.list', path_pattern: '/v1/kb/list', method: 'POST'}])

    expect(registry.match({sub_path: '/api/v1/kb/list', method: 'POST'}).matched).toBe(false)
    expect(registry.match({sub_path: '/v1/kb/list/extra', method: 'POST'}).matched).toBe(true)
  })

  it('ignores matches of zero length', () => {
    const registry = buildRegistry([{rule_id: 'optional', path_pattern: '(?:/x)?', method: '*'}])

    expect(registry.match({sub_path: '/y', method: 'GET'}).matched).toBe(false)
    expect(registry.match({sub_path: '/x', method: 'GET'}).matched).toBe(true)
  })

  it('returns no match for unknown verbs', () => {
    const registry = buildRegistry([{rule_id: 'any', path_pattern: '/', method: '*'}])

    expect(registry.match({sub_path: '/anything', method: 'BREW'}).matched).toBe(false)
  })

  it('rejects invalid patterns, duplicate ids and empty requirements', () => {
    const invalidPattern = createRuleRegistry([{rule_id: 'broken', path_pattern: '/v1/(', method: 'GET'}])
    expect(invalidPattern.ok === false && invalidPattern.reason_code).toBe('invalid_path_pattern')

    const duplicate = createRuleRegistry([
      {rule_id: 'same', path_pattern: '/a', method: 'GET'},
      {rule_id: 'same', path_pattern: '/b', method: 'GET'}
    ])
    expect(duplicate.ok === false && duplicate.reason_code).toBe('duplicate_rule_id')

    const emptyPermission = createRuleRegistry([
      {rule_id: 'empty', path_pattern: '/a', method: 'GET', permission: ''}
    ])
    expect(emptyPermission.ok === false && emptyPermission.reason_code).toBe('invalid_rule')

    const emptyList = createRuleRegistry([{rule_id: 'empty', path_pattern: '/a', method: 'GET', role: []}])
    expect(emptyList.ok === false && emptyList.reason_code).toBe('invalid_rule')
  })

  it('applies rule defaults and freezes the rule list', () => {
    const registry = buildRegistry([{rule_id: 'kb.create', path_pattern: '/v1/kb/create', method: 'post'}])

    expect(registry.rules[0]).toEqual({
      rule_id: 'kb.create',
      path_pattern: '/v1/kb/create',
      method: 'POST',
      permission_strict: false,
      role_strict: false,
      straightforward: false,
      streaming: false,
      pre_processors: [],
      post_processors: []
    })
    expect(Object.isFrozen(registry.rules)).toBe(true)
  })
})
