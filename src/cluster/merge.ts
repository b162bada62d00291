/**
 * Hostfleet — Layered Merge
 *
 * Folds configuration layers (fleet defaults, then the host's own
 * entry) into one object. Scalars: last writer wins. Lists: the later
 * layer replaces the earlier one, unless the field is additive, in which
 * case later entries come first and earlier ones follow. Nested mappings
 * merge field by field.
 */

export type Layer = Record<string, unknown>

export type MergePolicy = {
  /** Top-level list fields that accumulate across layers */
  additive: ReadonlySet<string>
}

function isMapping(value: unknown): value is Layer {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function overlay(base: Layer, top: Layer, policy: MergePolicy, depth: number): Layer {
  const result: Layer = { ...base }
  for (const [key, value] of Object.entries(top)) {
    if (value === undefined) continue
    const current = result[key]
    if (isMapping(value) && isMapping(current)) {
      result[key] = overlay(current, value, policy, depth + 1)
    } else if (depth === 0 && policy.additive.has(key) && Array.isArray(value) && Array.isArray(current)) {
      result[key] = [...value, ...current.filter(item => !value.includes(item))]
    } else {
      result[key] = value
    }
  }
  return result
}

/** Merge layers lowest-precedence first */
export function mergeLayers(layers: readonly Layer[], policy: MergePolicy): Layer {
  return layers.reduce<Layer>((acc, layer) => overlay(acc, layer, policy, 0), {})
}
