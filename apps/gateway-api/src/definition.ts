import {readFile} from 'node:fs/promises'
import path from 'node:path'

import {z} from 'zod'

import {ForwarderLimitsSchema, ForwarderTimeoutsSchema, StreamRelayOptionsSchema} from '@relaygate/forwarder'
import {CallerIdentitySchema, compilePathPattern, normalizeMountPrefix, RuleSchema} from '@relaygate/policy-engine'

const IdSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_.-]+$/u, 'ids may only contain letters, digits, dot, dash and underscore')

const NonEmptyStringSchema = z.string().trim().min(1)

const PathSchema = z.string().trim().startsWith('/')

export const UpstreamDefinitionSchema = z
  .object({
    id: IdSchema,
    base_url: z.url({protocol: /^https?$/u}),
    credential: IdSchema.optional(),
    stream_end_sentinel: z.string().min(1).optional(),
    timeouts: ForwarderTimeoutsSchema.partial().optional(),
    limits: ForwarderLimitsSchema.partial().optional(),
    stream: StreamRelayOptionsSchema.omit({end_sentinel: true}).partial().optional()
  })
  .strict()

export const CredentialDefinitionSchema = z
  .object({
    id: IdSchema,
    identity: NonEmptyStringSchema,
    nickname: NonEmptyStringSchema.optional(),
    public_key_path: NonEmptyStringSchema.optional(),
    public_key_pem: NonEmptyStringSchema.optional(),
    login_path: PathSchema.optional(),
    register_path: PathSchema.optional(),
    expiry_window_ms: z.number().int().positive().optional()
  })
  .strict()

export const MountDefinitionSchema = z
  .object({
    id: IdSchema,
    prefix: PathSchema,
    upstream: IdSchema,
    data_scope: z
      .object({
        entity: NonEmptyStringSchema,
        scope_column: NonEmptyStringSchema.default('scope_id')
      })
      .strict()
      .optional(),
    rules: z.array(RuleSchema)
  })
  .strict()

export const HookDefinitionSchema = z.discriminatedUnion('type', [
  z
    .object({
      name: IdSchema,
      type: z.literal('require_owner_metadata')
    })
    .strict(),
  z
    .object({
      name: IdSchema,
      type: z.literal('require_scope_ids'),
      field: NonEmptyStringSchema
    })
    .strict(),
  z
    .object({
      name: IdSchema,
      type: z.literal('filter_visible_items'),
      entity: NonEmptyStringSchema.optional(),
      /** dotted path to the array; omitted when the payload itself is the array */
      items_path: NonEmptyStringSchema.optional(),
      id_field: NonEmptyStringSchema.default('id'),
      total_path: NonEmptyStringSchema.optional()
    })
    .strict()
])

export const CallerDefinitionSchema = z
  .object({
    token_sha256: z.string().regex(/^[0-9a-f]{64}$/u, 'token_sha256 must be a lower-case hex SHA-256 digest'),
    identity: CallerIdentitySchema
  })
  .strict()

export const ScopedItemSchema = z
  .object({
    entity: NonEmptyStringSchema,
    id: NonEmptyStringSchema,
    scope_id: NonEmptyStringSchema
  })
  .strict()

export type HookType = z.infer<typeof HookDefinitionSchema>['type']
export type HookKind = 'pre' | 'post'

export const HOOK_KINDS: Record<HookType, HookKind> = {
  require_owner_metadata: 'pre',
  require_scope_ids: 'pre',
  filter_visible_items: 'post'
}

const findDuplicates = (values: readonly string[]) => {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value)
    }
    seen.add(value)
  }

  return [...duplicates]
}

export const GatewayDefinitionSchema = z
  .object({
    upstreams: z.array(UpstreamDefinitionSchema).min(1),
    credentials: z.array(CredentialDefinitionSchema).default([]),
    mounts: z.array(MountDefinitionSchema).min(1),
    hooks: z.array(HookDefinitionSchema).default([]),
    callers: z.array(CallerDefinitionSchema).default([]),
    scoped_items: z.array(ScopedItemSchema).default([])
  })
  .strict()
  .superRefine((definition, context) => {
    const report = (pathSegments: (string | number)[], message: string) => {
      context.addIssue({code: 'custom', path: pathSegments, message})
    }

    const uniqueness: [string, string[]][] = [
      ['upstreams', definition.upstreams.map(upstream => upstream.id)],
      ['credentials', definition.credentials.map(credential => credential.id)],
      ['mounts', definition.mounts.map(mount => mount.id)],
      ['hooks', definition.hooks.map(hook => hook.name)],
      ['callers', definition.callers.map(caller => caller.token_sha256)]
    ]
    for (const [field, values] of uniqueness) {
      for (const duplicate of findDuplicates(values)) {
        report([field], `Duplicate entry: ${duplicate}`)
      }
    }

    for (const duplicate of findDuplicates(definition.mounts.map(mount => normalizeMountPrefix(mount.prefix)))) {
      report(['mounts'], `Duplicate mount prefix: ${duplicate}`)
    }

    const credentialIds = new Set(definition.credentials.map(credential => credential.id))
    const upstreamIds = new Set(definition.upstreams.map(upstream => upstream.id))
    const hookKinds = new Map(definition.hooks.map(hook => [hook.name, HOOK_KINDS[hook.type]] as const))

    for (const [index, credential] of definition.credentials.entries()) {
      const keySources = [credential.public_key_path, credential.public_key_pem].filter(value => value !== undefined)
      if (keySources.length !== 1) {
        report(['credentials', index], 'Exactly one of public_key_path or public_key_pem is required')
      }
    }

    for (const [index, upstream] of definition.upstreams.entries()) {
      if (upstream.credential && !credentialIds.has(upstream.credential)) {
        report(['upstreams', index, 'credential'], `Unknown credential: ${upstream.credential}`)
      }
    }

    for (const [mountIndex, mount] of definition.mounts.entries()) {
      if (!upstreamIds.has(mount.upstream)) {
        report(['mounts', mountIndex, 'upstream'], `Unknown upstream: ${mount.upstream}`)
      }

      for (const duplicate of findDuplicates(mount.rules.map(rule => rule.rule_id))) {
        report(['mounts', mountIndex, 'rules'], `Duplicate rule_id: ${duplicate}`)
      }

      for (const [ruleIndex, rule] of mount.rules.entries()) {
        const rulePath = ['mounts', mountIndex, 'rules', ruleIndex]
        if (!compilePathPattern(rule.path_pattern)) {
          report([...rulePath, 'path_pattern'], `Invalid path_pattern: ${rule.path_pattern}`)
        }

        if (rule.streaming && rule.post_processors.length > 0) {
          report([...rulePath, 'post_processors'], 'Streaming rules cannot declare post-processors')
        }

        const references: [HookKind, string[]][] = [
          ['pre', rule.pre_processors],
          ['post', rule.post_processors]
        ]
        for (const [expectedKind, names] of references) {
          for (const name of names) {
            const kind = hookKinds.get(name)
            if (!kind) {
              report([...rulePath, `${expectedKind}_processors`], `Unknown hook: ${name}`)
            } else if (kind !== expectedKind) {
              report([...rulePath, `${expectedKind}_processors`], `Hook ${name} is a ${kind}-processor`)
            }
          }
        }
      }
    }
  })

export type GatewayDefinitionInput = z.input<typeof GatewayDefinitionSchema>
export type GatewayDefinition = z.infer<typeof GatewayDefinitionSchema>
export type UpstreamDefinition = z.infer<typeof UpstreamDefinitionSchema>
export type CredentialDefinition = z.infer<typeof CredentialDefinitionSchema>
export type MountDefinition = z.infer<typeof MountDefinitionSchema>
export type HookDefinition = z.infer<typeof HookDefinitionSchema>
export type CallerDefinition = z.infer<typeof CallerDefinitionSchema>
export type ScopedItem = z.infer<typeof ScopedItemSchema>

const formatIssues = (error: z.ZodError) =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')

export const parseGatewayDefinition = (raw: unknown): GatewayDefinition => {
  const parsed = GatewayDefinitionSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Gateway definition is invalid: ${formatIssues(parsed.error)}`)
  }

  return parsed.data
}

/** Inlines every `public_key_path`, read relative to `baseDir`. */
export const resolveCredentialKeys = async ({
  definition,
  baseDir
}: {
  definition: GatewayDefinition
  baseDir: string
}): Promise<GatewayDefinition> => {
  const credentials = await Promise.all(
    definition.credentials.map(async credential => {
      if (credential.public_key_pem || !credential.public_key_path) {
        return credential
      }

      const keyPath = path.resolve(baseDir, credential.public_key_path)
      try {
        // eslint-disable-next-line security/detect-non-literal-fs-filename -- key paths are explicit gateway configuration.
        const pem = await readFile(keyPath, 'utf8')
        return {...credential, public_key_pem: pem}
      } catch (error) {
        const reason = error instanceof Error ? error.message : 'unknown error'
        throw new Error(`Unable to read public key for credential ${credential.id}: ${reason}`)
      }
    })
  )

  return {...definition, credentials}
}

export const loadGatewayDefinition = async (definitionPath: string): Promise<GatewayDefinition> => {
  let raw: unknown
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- the definition path is explicit service configuration.
    raw = JSON.parse(await readFile(definitionPath, 'utf8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new Error(`Unable to read gateway definition ${definitionPath}: ${reason}`)
  }

  return resolveCredentialKeys({
    definition: parseGatewayDefinition(raw),
    baseDir: path.dirname(path.resolve(definitionPath))
  })
}
