export type MountResolution<TMount> = {
  mount: TMount
  sub_path: string
}

export type MountTable<TMount> = {
  resolve: (pathname: string) => MountResolution<TMount> | null
}

export const normalizeMountPrefix = (prefix: string) => {
  const trimmed = prefix.trim()
  const withLeadingSlash = trimmed.startsWith('/') ? trimmed : `/${trimmed}`
  const withoutTrailingSlash = withLeadingSlash.replace(/\/+$/u, '')
  return withoutTrailingSlash.length === 0 ? '/' : withoutTrailingSlash
}

/**
 * Resolves a request path to the mount with the longest matching prefix.
 * Prefixes match on whole path segments, so `/kb` does not claim `/kbx`.
 * The sub-path keeps its leading slash; a bare mount path resolves to `/`.
 */
export const createMountTable = <TMount extends {prefix: string}>(mounts: readonly TMount[]): MountTable<TMount> => {
  const entries = mounts
    .map(mount => ({mount, prefix: normalizeMountPrefix(mount.prefix)}))
    .sort((left, right) => right.prefix.length - left.prefix.length)

  const resolve = (pathname: string): MountResolution<TMount> | null => {
    for (const entry of entries) {
      if (entry.prefix === '/') {
        return {mount: entry.mount, sub_path: pathname.length > 0 ? pathname : '/'}
      }

      if (pathname === entry.prefix) {
        return {mount: entry.mount, sub_path: '/'}
      }

      if (pathname.startsWith(`${entry.prefix}/`)) {
        return {mount: entry.mount, sub_path: pathname.slice(entry.prefix.length)}
      }
    }

    return null
  }

  return {resolve}
}
