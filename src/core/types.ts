/**
 * Kind of chat a command was sent from, as reported by the chat backend.
 */
export type ChatType = 'private' | 'group' | 'supergroup' | 'channel'

/**
 * Membership status of a user inside a group chat.
 */
export type MemberStatus = 'creator' | 'administrator' | 'member' | 'restricted' | 'left' | 'kicked'

/**
 * Normalized description of who sent a command and where.
 *
 * Supplied by the message source; the parsing core never inspects it.
 * Permission predicates read it to decide access.
 */
export interface CallerContext {
  chatId: string
  chatType: ChatType
  senderId: string
  senderUsername?: string
  /** Looks up the sender's status in the current chat. May perform I/O. */
  getMemberStatus?: () => Promise<MemberStatus>
}

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}
