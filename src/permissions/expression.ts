import { PermissionConstructionError } from '../core/errors.js'

/** Leaf check over the caller context; may suspend for I/O. */
export type PermissionPredicate<C> = (context: C) => boolean | Promise<boolean>

export type PermissionOperator = 'and' | 'or'

export interface PermissionLeaf<C> {
  readonly kind: 'leaf'
  /** Label used when rendering the expression. */
  readonly name: string
  readonly predicate: PermissionPredicate<C>
}

export interface PermissionGroup<C> {
  readonly kind: PermissionOperator
  readonly children: ReadonlySet<PermissionNode<C>>
}

export interface PermissionNot<C> {
  readonly kind: 'not'
  readonly child: PermissionNode<C>
}

/**
 * Boolean permission expression. Built once at registration time and
 * shared read-only between invocations.
 */
export type PermissionNode<C> = PermissionLeaf<C> | PermissionGroup<C> | PermissionNot<C>

/** Wraps a predicate as a named leaf. */
export function permission<C>(name: string, predicate: PermissionPredicate<C>): PermissionLeaf<C> {
  const leaf: PermissionLeaf<C> = { kind: 'leaf', name, predicate }
  return Object.freeze(leaf)
}

export function not<C>(child: PermissionNode<C>): PermissionNot<C> {
  const node: PermissionNot<C> = { kind: 'not', child }
  return Object.freeze(node)
}

function isOperator(op: string): op is PermissionOperator {
  return op === 'and' || op === 'or'
}

function group<C>(op: PermissionOperator, children: Iterable<PermissionNode<C>>): PermissionGroup<C> {
  const set = new Set(children)
  if (set.size === 0) {
    throw new PermissionConstructionError(`'${op}' needs at least one operand`)
  }
  const node: PermissionGroup<C> = { kind: op, children: set }
  return Object.freeze(node)
}

function operands<C>(node: PermissionNode<C>, op: PermissionOperator): Iterable<PermissionNode<C>> {
  if ((node.kind === 'and' || node.kind === 'or') && node.kind === op) return node.children
  return [node]
}

/**
 * Combines two nodes with `op`.
 *
 * Operands that already are `op` groups contribute their children instead
 * of being nested, so `(a & b) & c` becomes one group `{a, b, c}`. AND and
 * OR groups are never flattened into each other.
 */
export function merge<C>(a: PermissionNode<C>, b: PermissionNode<C>, op: PermissionOperator): PermissionGroup<C> {
  if (!isOperator(op)) {
    throw new PermissionConstructionError(`Unsupported permission operator '${String(op)}'`)
  }
  return group(op, [...operands(a, op), ...operands(b, op)])
}

function fold<C>(op: PermissionOperator, nodes: readonly PermissionNode<C>[]): PermissionNode<C> {
  const [first, ...rest] = nodes
  if (!first) {
    throw new PermissionConstructionError(`'${op}' needs at least one operand`)
  }
  if (rest.length === 0) return first
  return rest.reduce<PermissionNode<C>>((acc, node) => merge(acc, node, op), first)
}

/** Conjunction of all nodes, flattened. A single node is returned as is. */
export function allOf<C>(...nodes: PermissionNode<C>[]): PermissionNode<C> {
  return fold('and', nodes)
}

/** Disjunction of all nodes, flattened. A single node is returned as is. */
export function anyOf<C>(...nodes: PermissionNode<C>[]): PermissionNode<C> {
  return fold('or', nodes)
}

/**
 * Evaluates `node` against `context`.
 *
 * Children are awaited one at a time, left to right, and AND/OR stop at the
 * first deciding result. Nothing is memoized between evaluations.
 */
export async function evaluatePermission<C>(node: PermissionNode<C>, context: C): Promise<boolean> {
  switch (node.kind) {
    case 'leaf':
      return Boolean(await node.predicate(context))
    case 'not':
      return !(await evaluatePermission(node.child, context))
    case 'and':
      for (const child of node.children) {
        if (!(await evaluatePermission(child, context))) return false
      }
      return true
    case 'or':
      for (const child of node.children) {
        if (await evaluatePermission(child, context)) return true
      }
      return false
  }
}

const OPERATOR_SYMBOL: Record<PermissionOperator, string> = { and: ' & ', or: ' | ' }

/**
 * Renders an expression as infix text, e.g. `privateChat & (userId(1) | ~groupAdmin)`.
 */
export function describePermission<C>(node: PermissionNode<C>): string {
  const render = (child: PermissionNode<C>): string => {
    const text = describePermission(child)
    return child.kind === 'and' || child.kind === 'or' ? `(${text})` : text
  }

  switch (node.kind) {
    case 'leaf':
      return node.name
    case 'not':
      return `~${render(node.child)}`
    case 'and':
    case 'or': {
      const parts = [...node.children].map(render)
      return parts.length === 1 ? (parts[0] ?? '') : parts.join(OPERATOR_SYMBOL[node.kind])
    }
  }
}
