/**
 * Naming scheme for constant-pool entries generated from literals inside function bodies.
 *
 * The scheme is shared by the validator (which reserves it) and the code generator (which uses it).
 */
const POOL_PREFIX = '_c_const_';

const POOL_NAME_RE = new RegExp(`^${POOL_PREFIX}[A-Za-z_][A-Za-z0-9_]*_[0-9]+$`);

export function poolEntryName(functionName: string, index: number): string {
  return `${POOL_PREFIX}${functionName}_${index}`;
}

/**
 * True when `name` has the shape of a generated pool entry and so cannot be declared by users.
 */
export function isReservedPoolName(name: string): boolean {
  return POOL_NAME_RE.test(name);
}
