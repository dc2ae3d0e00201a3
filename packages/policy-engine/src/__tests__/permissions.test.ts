import {describe, expect, it} from 'vitest'

import {
  CallerIdentitySchema,
  RuleSchema,
  checkAccess,
  checkPermission,
  checkRole,
  type CallerIdentityInput,
  type RuleInput
} from '../index'

const rule = (input: Partial<RuleInput>) =>
  RuleSchema.parse({rule_id: 'test.rule', path_pattern: '/test', method: 'GET', ...input})

const identity = (input: Partial<CallerIdentityInput>) => CallerIdentitySchema.parse({user_id: 'user_1', ...input})

describe('checkPermission', () => {
  it('allows rules without a permission requirement', () => {
    expect(checkPermission(identity({}), rule({}))).toEqual({allowed: true})
  })

  it('requires membership for a single permission', () => {
    const kbCreate = rule({permission: 'kb:kb:add'})

    expect(checkPermission(identity({permissions: ['kb:kb:add']}), kbCreate)).toEqual({allowed: true})
    expect(checkPermission(identity({permissions: ['kb:kb:list']}), kbCreate)).toEqual({
      allowed: false,
      reason_code: 'permission_denied',
      message: 'Rule test.rule requires permission kb:kb:add'
    })
  })

  it('accepts any listed permission when not strict', () => {
    const decision = checkPermission(identity({permissions: ['b']}), rule({permission: ['a', 'b']}))

    expect(decision).toEqual({allowed: true})
  })

  it('requires every listed permission when strict', () => {
    const strictRule = rule({permission: ['a', 'b'], permission_strict: true})

    expect(checkPermission(identity({permissions: ['b']}), strictRule)).toEqual({
      allowed: false,
      reason_code: 'permission_denied',
      message: 'Rule test.rule requires permission all of [a, b]'
    })
    expect(checkPermission(identity({permissions: ['a', 'b']}), strictRule)).toEqual({allowed: true})
  })

  it('lets the all-permissions marker through', () => {
    const decision = checkPermission(
      identity({permissions: ['*:*:*']}),
      rule({permission: ['a', 'b'], permission_strict: true})
    )

    expect(decision).toEqual({allowed: true})
  })
})

describe('checkRole', () => {
  it('evaluates role lists the same way as permissions', () => {
    expect(checkRole(identity({roles: ['editor']}), rule({role: ['admin', 'editor']}))).toEqual({allowed: true})
    expect(checkRole(identity({roles: ['editor']}), rule({role: ['owner', 'editor'], role_strict: true}))).toEqual({
      allowed: false,
      reason_code: 'role_denied',
      message: 'Rule test.rule requires role all of [owner, editor]'
    })
    expect(checkRole(identity({roles: []}), rule({role: 'ops'}))).toEqual({
      allowed: false,
      reason_code: 'role_denied',
      message: 'Rule test.rule requires role ops'
    })
  })

  it('does not treat the all-permissions marker as a role', () => {
    expect(checkRole(identity({permissions: ['*:*:*']}), rule({role: 'ops'})).allowed).toBe(false)
  })
})

describe('administrators', () => {
  it('pass every permission and role check regardless of rule content', () => {
    const admin = identity({is_admin: true})
    const guarded = rule({
      permission: ['x', 'y'],
      permission_strict: true,
      role: ['r1', 'r2'],
      role_strict: true
    })

    expect(checkPermission(admin, guarded)).toEqual({allowed: true})
    expect(checkRole(admin, guarded)).toEqual({allowed: true})
    expect(checkAccess(admin, guarded)).toEqual({allowed: true})
  })
})

describe('checkAccess', () => {
  it('reports a role denial before a permission denial', () => {
    const guarded = rule({permission: 'kb:kb:add', role: 'editor'})

    expect(checkAccess(identity({}), guarded)).toMatchObject({allowed: false, reason_code: 'role_denied'})
    expect(checkAccess(identity({roles: ['editor']}), guarded)).toMatchObject({
      allowed: false,
      reason_code: 'permission_denied'
    })
    expect(checkAccess(identity({roles: ['editor'], permissions: ['kb:kb:add']}), guarded)).toEqual({
      allowed: true
    })
  })
})
