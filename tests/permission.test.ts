import { describe, expect, it, vi } from 'vitest'

import { PermissionConstructionError } from '../src/core/errors.js'
import {
  allOf,
  anyOf,
  describePermission,
  evaluatePermission,
  merge,
  not,
  permission,
  type PermissionNode
} from '../src/permissions/expression.js'

const TRUE = permission<null>('yes', () => true)
const FALSE = permission<null>('no', () => false)

function check(node: PermissionNode<null>): Promise<boolean> {
  return evaluatePermission(node, null)
}

describe('permission expressions', () => {
  it('evaluates leaves', async () => {
    expect(await check(TRUE)).toBe(true)
    expect(await check(FALSE)).toBe(false)
    expect(await check(permission<null>('later', async () => true))).toBe(true)
  })

  it('evaluates and / or / not', async () => {
    expect(await check(allOf(TRUE, TRUE))).toBe(true)
    expect(await check(allOf(TRUE, FALSE))).toBe(false)
    expect(await check(anyOf(FALSE, TRUE))).toBe(true)
    expect(await check(anyOf(FALSE, FALSE))).toBe(false)
    expect(await check(not(TRUE))).toBe(false)
    expect(await check(not(not(TRUE)))).toBe(true)
    expect(await check(not(not(FALSE)))).toBe(false)
  })

  it('returns a single operand unchanged', () => {
    expect(allOf(TRUE)).toBe(TRUE)
    expect(anyOf(FALSE)).toBe(FALSE)
  })

  it('rejects empty groups', () => {
    expect(() => allOf<null>()).toThrow(PermissionConstructionError)
    expect(() => anyOf<null>()).toThrow(PermissionConstructionError)
  })

  it('flattens operands of the same operator', () => {
    const a = permission<null>('a', () => true)
    const b = permission<null>('b', () => true)
    const c = permission<null>('c', () => true)

    const merged = merge(merge(a, b, 'and'), c, 'and')
    expect(merged.kind).toBe('and')
    expect([...merged.children]).toEqual([a, b, c])

    const both = merge(merge(a, b, 'or'), merge(c, a, 'or'), 'or')
    expect(both.children.size).toBe(3)
  })

  it('keeps groups of the other operator nested', () => {
    const a = permission<null>('a', () => true)
    const b = permission<null>('b', () => true)
    const c = permission<null>('c', () => true)

    const inner = merge(a, b, 'or')
    const outer = merge(inner, c, 'and')
    expect(outer.children.size).toBe(2)
    expect(outer.children.has(inner)).toBe(true)
    expect(outer.children.has(c)).toBe(true)
  })

  it('drops duplicate operands', () => {
    expect(merge(TRUE, TRUE, 'and').children.size).toBe(1)
  })

  it('freezes nodes', () => {
    expect(Object.isFrozen(TRUE)).toBe(true)
    expect(Object.isFrozen(not(TRUE))).toBe(true)
    expect(Object.isFrozen(merge(TRUE, FALSE, 'or'))).toBe(true)
  })

  it('stops at the first deciding operand', async () => {
    const spy = vi.fn(() => true)
    const tail = permission<null>('tail', spy)

    expect(await check(allOf(FALSE, tail))).toBe(false)
    expect(await check(anyOf(TRUE, tail))).toBe(true)
    expect(spy).not.toHaveBeenCalled()

    expect(await check(allOf(TRUE, tail))).toBe(true)
    expect(spy).toHaveBeenCalledTimes(1)
  })

  it('evaluates against the given context', async () => {
    const even = permission<number>('even', (n) => n % 2 === 0)
    expect(await evaluatePermission(even, 4)).toBe(true)
    expect(await evaluatePermission(not(even), 4)).toBe(false)
  })

  it('propagates predicate failures', async () => {
    const broken = permission<null>('broken', () => {
      throw new Error('lookup failed')
    })
    await expect(check(allOf(TRUE, broken))).rejects.toThrow('lookup failed')
  })
})

describe('describePermission', () => {
  it('renders infix with parentheses around nested groups', () => {
    const p = permission<null>('p', () => true)
    const u = permission<null>('u', () => true)
    const g = permission<null>('g', () => true)

    expect(describePermission(allOf(p, anyOf(u, not(g))))).toBe('p & (u | ~g)')
    expect(describePermission(not(allOf(p, u)))).toBe('~(p & u)')
    expect(describePermission(anyOf(p, u, g))).toBe('p | u | g')
  })
})
