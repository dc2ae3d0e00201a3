import {z} from 'zod'

const NonEmptyStringSchema = z.string().trim().min(1)

export const HttpMethodSchema = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'])
)
export type HttpMethod = z.infer<typeof HttpMethodSchema>

export const RuleMethodSchema = z.union([z.literal('*'), HttpMethodSchema])
export type RuleMethod = z.infer<typeof RuleMethodSchema>

export const RequirementValueSchema = z.union([NonEmptyStringSchema, z.array(NonEmptyStringSchema).min(1)])
export type RequirementValue = z.infer<typeof RequirementValueSchema>

export const RuleSchema = z
  .object({
    rule_id: NonEmptyStringSchema,
    description: z.string().optional(),
    path_pattern: NonEmptyStringSchema,
    method: RuleMethodSchema,
    permission: RequirementValueSchema.optional(),
    permission_strict: z.boolean().default(false),
    role: RequirementValueSchema.optional(),
    role_strict: z.boolean().default(false),
    straightforward: z.boolean().default(false),
    streaming: z.boolean().default(false),
    upstream_path: NonEmptyStringSchema.optional(),
    pre_processors: z.array(NonEmptyStringSchema).default([]),
    post_processors: z.array(NonEmptyStringSchema).default([])
  })
  .strict()

export type RuleInput = z.input<typeof RuleSchema>
export type Rule = z.infer<typeof RuleSchema>

export const CallerIdentitySchema = z
  .object({
    user_id: NonEmptyStringSchema,
    user_name: z.string().optional(),
    permissions: z.array(NonEmptyStringSchema).default([]),
    roles: z.array(NonEmptyStringSchema).default([]),
    is_admin: z.boolean().default(false),
    scope_ids: z.array(NonEmptyStringSchema).default([])
  })
  .strict()

export type CallerIdentityInput = z.input<typeof CallerIdentitySchema>
export type CallerIdentity = z.infer<typeof CallerIdentitySchema>

/**
 * Row-visibility predicate handed to the storage layer. It is never evaluated here.
 * `none` must stay distinct from "no filter": an empty scope set matches no rows.
 */
export type DataScopePredicate =
  | {kind: 'all'}
  | {kind: 'none'}
  | {kind: 'any_of'; entity: string; column: string; values: string[]}

export type Requirement =
  | {kind: 'none'}
  | {kind: 'single'; value: string}
  | {kind: 'list'; values: string[]; strict: boolean}

export const AccessReasonCodeSchema = z.enum(['permission_denied', 'role_denied'])
export type AccessReasonCode = z.infer<typeof AccessReasonCodeSchema>

export type AccessDecision =
  | {allowed: true}
  | {allowed: false; reason_code: AccessReasonCode; message: string}

export const RegistryReasonCodeSchema = z.enum(['invalid_rule', 'invalid_path_pattern', 'duplicate_rule_id'])
export type RegistryReasonCode = z.infer<typeof RegistryReasonCodeSchema>

export type RuleMatchResult =
  | {matched: true; rule: Rule; matched_length: number}
  | {matched: false; reason_code: 'no_matching_rule'}

export const ALL_PERMISSIONS_MARKER = '*:*:*'
