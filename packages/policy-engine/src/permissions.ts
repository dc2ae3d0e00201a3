import {
  ALL_PERMISSIONS_MARKER,
  type AccessDecision,
  type CallerIdentity,
  type Requirement,
  type RequirementValue,
  type Rule
} from './contracts'

export const toRequirement = ({
  value,
  strict
}: {
  value: RequirementValue | undefined
  strict: boolean
}): Requirement => {
  if (value === undefined) {
    return {kind: 'none'}
  }

  if (typeof value === 'string') {
    return {kind: 'single', value}
  }

  return {kind: 'list', values: [...value], strict}
}

export const isRequirementSatisfied = ({
  requirement,
  held
}: {
  requirement: Requirement
  held: ReadonlySet<string>
}) => {
  switch (requirement.kind) {
    case 'none':
      return true
    case 'single':
      return held.has(requirement.value)
    case 'list':
      return requirement.strict
        ? requirement.values.every(value => held.has(value))
        : requirement.values.some(value => held.has(value))
  }
}

const describeRequirement = (requirement: Requirement) => {
  switch (requirement.kind) {
    case 'none':
      return 'nothing'
    case 'single':
      return requirement.value
    case 'list':
      return `${requirement.strict ? 'all of' : 'any of'} [${requirement.values.join(', ')}]`
  }
}

export const checkPermission = (identity: CallerIdentity, rule: Rule): AccessDecision => {
  if (identity.is_admin) {
    return {allowed: true}
  }

  const held = new Set(identity.permissions)
  if (held.has(ALL_PERMISSIONS_MARKER)) {
    return {allowed: true}
  }

  const requirement = toRequirement({value: rule.permission, strict: rule.permission_strict})
  if (isRequirementSatisfied({requirement, held})) {
    return {allowed: true}
  }

  return {
    allowed: false,
    reason_code: 'permission_denied',
    message: `Rule ${rule.rule_id} requires permission ${describeRequirement(requirement)}`
  }
}

export const checkRole = (identity: CallerIdentity, rule: Rule): AccessDecision => {
  if (identity.is_admin) {
    return {allowed: true}
  }

  const requirement = toRequirement({value: rule.role, strict: rule.role_strict})
  if (isRequirementSatisfied({requirement, held: new Set(identity.roles)})) {
    return {allowed: true}
  }

  return {
    allowed: false,
    reason_code: 'role_denied',
    message: `Rule ${rule.rule_id} requires role ${describeRequirement(requirement)}`
  }
}

/** Role first, then permission. Returns the first denial. */
export const checkAccess = (identity: CallerIdentity, rule: Rule): AccessDecision => {
  const roleDecision = checkRole(identity, rule)
  if (!roleDecision.allowed) {
    return roleDecision
  }

  return checkPermission(identity, rule)
}
