/**
 * Effective action of a resource change. The well-known labels are listed for
 * completion; any other token combination passes through as its own label.
 */
export type EffectiveAction = 'create' | 'delete' | 'update' | 'replace' | 'no-op' | 'unknown' | (string & {})

/**
 * Collapses the raw action tokens of a planned change into a single label.
 *
 * `delete` + `create` (in any order) is a replacement. Unrecognised tokens are
 * deduplicated, sorted and comma-joined, so `["read"]` stays `read`.
 */
export function classifyActions(actions: readonly string[]): EffectiveAction {
  const actionSet = new Set(actions)

  if (actionSet.has('delete') && actionSet.has('create')) {
    return 'replace'
  }
  if (actionSet.has('create')) {
    return 'create'
  }
  if (actionSet.has('delete')) {
    return 'delete'
  }
  if (actionSet.has('update')) {
    return 'update'
  }
  if (actionSet.has('no-op')) {
    return 'no-op'
  }

  if (actionSet.size === 0) {
    return 'unknown'
  }

  return [...actionSet].sort().join(',')
}
