import type { CallerContext, ChatType, MemberStatus } from '../core/types.js'
import { permission, type PermissionLeaf } from './expression.js'

export type CallerPermission = PermissionLeaf<CallerContext>

/** Always granted. */
export const ANYBODY: CallerPermission = permission('anybody', () => true)

/** Never granted. */
export const NOBODY: CallerPermission = permission('nobody', () => false)

/** Granted when the sender's id is one of `ids`. */
export function userId(...ids: Array<string | number>): CallerPermission {
  const allowed = new Set(ids.map(String))
  return permission(`userId(${[...allowed].join(' | ')})`, (ctx) => allowed.has(ctx.senderId))
}

function normalizeUsername(name: string): string | undefined {
  const trimmed = name.trim()
  if (!trimmed) return undefined
  return trimmed.startsWith('@') ? trimmed.slice(1) : trimmed
}

/** Granted when the sender's username (with or without `@`) is one of `names`. */
export function userName(...names: string[]): CallerPermission {
  const allowed = new Set<string>()
  for (const name of names) {
    const normalized = normalizeUsername(name)
    if (normalized) allowed.add(normalized)
  }
  return permission(`userName(${[...allowed].join(' | ')})`, (ctx) =>
    ctx.senderUsername !== undefined && allowed.has(ctx.senderUsername)
  )
}

function chatOfType(name: string, type: ChatType): CallerPermission {
  return permission(name, (ctx) => ctx.chatType === type)
}

export const privateChat: CallerPermission = chatOfType('privateChat', 'private')
export const groupChat: CallerPermission = chatOfType('groupChat', 'group')
export const supergroupChat: CallerPermission = chatOfType('supergroupChat', 'supergroup')

async function memberStatus(ctx: CallerContext): Promise<MemberStatus | undefined> {
  return ctx.getMemberStatus ? ctx.getMemberStatus() : undefined
}

/** Granted when the sender created the current chat. */
export const groupCreator: CallerPermission = permission(
  'groupCreator',
  async (ctx) => (await memberStatus(ctx)) === 'creator'
)

/**
 * Granted when the sender administers the current chat (creators included).
 * Always granted in a private chat.
 */
export const groupAdmin: CallerPermission = permission('groupAdmin', async (ctx) => {
  if (ctx.chatType === 'private') return true
  const status = await memberStatus(ctx)
  return status === 'administrator' || status === 'creator'
})
