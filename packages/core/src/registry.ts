// @scantoken/core — ComponentRegistry capability

import { isValidComponent } from './grammar.js'

/**
 * Membership check against the externally maintained component allocation list.
 *
 * May answer synchronously (static list, cache) or with a promise (remote
 * service). A thrown error or rejected promise means the registry could not
 * answer; callers report it as `registry_unavailable`, never as unallocated.
 */
export interface ComponentRegistry {
  isAllocated(component: string): boolean | Promise<boolean>
}

/**
 * Creates a registry backed by a fixed list of components.
 *
 * @throws {TypeError} If any entry is not 3–6 lowercase ASCII letters
 */
export function createStaticRegistry(components: Iterable<string>): ComponentRegistry {
  const allocated = new Set<string>()
  for (const component of components) {
    if (!isValidComponent(component)) {
      throw new TypeError(
        `Invalid component ${JSON.stringify(component)}: expected 3-6 lowercase ASCII letters`,
      )
    }
    allocated.add(component)
  }

  return {
    isAllocated(component: string): boolean {
      return allocated.has(component)
    },
  }
}

type RegistryAnswer =
  | { readonly ok: true; readonly allocated: boolean }
  | { readonly ok: false; readonly error: unknown }

/**
 * Asks the registry about a component, capturing failures instead of throwing.
 */
export async function queryRegistry(
  registry: ComponentRegistry,
  component: string,
): Promise<RegistryAnswer> {
  try {
    const allocated = await registry.isAllocated(component)
    return { ok: true, allocated }
  } catch (error) {
    return { ok: false, error }
  }
}
