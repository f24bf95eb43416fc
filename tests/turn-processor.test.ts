import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { ChatReply } from '@/types/chat'
import type { ConversationState } from '@/types/conversation'
import { createConversationState } from '@/lib/conversation-state'
import { queueConfirmation, queueTimeSelection } from '@/lib/pending-actions'
import { drainPendingAction, processTurn } from '@/lib/turn-processor'

const reply = (overrides: Partial<ChatReply> = {}): ChatReply => ({
  message: 'ok',
  bookingData: null,
  suggestedTimes: [],
  requiresConfirmation: false,
  ...overrides,
})

describe('processTurn', () => {
  let state: ConversationState

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    state = createConversationState('test-session')
  })

  it('appends the user turn then the assistant turn built from the reply', async () => {
    const send = vi.fn(async (_message: string, _sessionId: string) =>
      reply({ message: 'Pick a slot', suggestedTimes: ['10 AM', '2 PM'] })
    )

    const result = await processTurn(state, { content: '  book tomorrow  ' }, send)

    expect(send).toHaveBeenCalledWith('book tomorrow', 'test-session')
    expect(result).toMatchObject({ userTurnIndex: 0, assistantTurnIndex: 1 })
    expect(state.turns.map((turn) => [turn.role, turn.content])).toEqual([
      ['user', 'book tomorrow'],
      ['assistant', 'Pick a slot'],
    ])
    expect(state.turns[1].suggestedTimes).toEqual(['10 AM', '2 PM'])
    expect(state.lastSuggestionTurn).toBe(1)
    expect(state.lastBookingTurn).toBe(-1)
  })

  it('moves the booking index only for replies with a booking id', async () => {
    const send = vi
      .fn(async (_message: string, _sessionId: string) => reply())
      .mockResolvedValueOnce(reply({ message: 'Booked!', bookingData: { id: 'evt123', title: 'Sync' } }))
      .mockResolvedValueOnce(reply({ message: 'Nothing booked' }))

    await processTurn(state, { content: 'book' }, send)
    await processTurn(state, { content: 'thanks' }, send)

    expect(state.lastBookingTurn).toBe(1)
    expect(state.turns[1].bookingData).toEqual({ id: 'evt123', title: 'Sync' })
  })

  it('keeps the startup marker on the assistant turn', async () => {
    const send = vi.fn(async (_message: string, _sessionId: string) =>
      reply({ message: 'waking up', isStartupNotice: true, retryAfterSeconds: 45 })
    )

    await processTurn(state, { content: 'hello' }, send)

    expect(state.turns[1]).toMatchObject({ isStartupNotice: true, retryAfterSeconds: 45, bookingData: null })
  })
})

describe('drainPendingAction', () => {
  let state: ConversationState

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    state = createConversationState('test-session')
  })

  it('turns a pending time selection into exactly one exchange even when the call fails', async () => {
    const send = vi.fn(async (_message: string, _sessionId: string): Promise<ChatReply> => {
      throw new Error('boom')
    })
    queueTimeSelection(state, '3:00 PM')

    await drainPendingAction(state, send)

    expect(send).toHaveBeenCalledTimes(1)
    expect(state.pendingTimeSelection).toBeNull()
    expect(state.turns).toHaveLength(2)
    expect(state.turns[0]).toMatchObject({ role: 'user', content: '3:00 PM', isTimeSelection: true })
    expect(state.turns[1]).toMatchObject({
      role: 'assistant',
      content: 'Connection error: boom. Please check if the backend is running.',
      bookingData: null,
      suggestedTimes: [],
      requiresConfirmation: false,
    })

    await expect(drainPendingAction(state, send)).resolves.toBeNull()
    expect(state.turns).toHaveLength(2)
  })

  it('clears the slot before the backend answers', async () => {
    let resolveSend: (value: ChatReply) => void = () => undefined
    const send = vi.fn(
      (_message: string, _sessionId: string) => new Promise<ChatReply>((resolve) => { resolveSend = resolve })
    )
    queueConfirmation(state, 'yes')

    const pending = drainPendingAction(state, send)

    expect(state.pendingConfirmation).toBeNull()
    expect(state.turns).toHaveLength(1)
    expect(state.turns[0]).toMatchObject({ content: 'yes', isConfirmation: true })

    resolveSend(reply({ message: 'Booked!', bookingData: { id: 'evt7' } }))
    await pending
    expect(state.turns).toHaveLength(2)
    expect(state.lastBookingTurn).toBe(1)
  })

  it('drains a time selection before a confirmation set in the same pass', async () => {
    const send = vi.fn(async (message: string, _sessionId: string) => reply({ message: `got ${message}` }))
    queueTimeSelection(state, '10 AM')
    queueConfirmation(state, 'no, cancel')

    const first = await drainPendingAction(state, send)
    expect(first?.reply.message).toBe('got 10 AM')
    expect(state.pendingTimeSelection).toBeNull()
    expect(state.pendingConfirmation).toBe('no, cancel')

    await drainPendingAction(state, send)
    expect(state.pendingConfirmation).toBeNull()
    expect(state.turns.map((turn) => turn.content)).toEqual(['10 AM', 'got 10 AM', 'no, cancel', 'got no, cancel'])
    expect(state.turns[0].isTimeSelection).toBe(true)
    expect(state.turns[2].isConfirmation).toBe(true)
    expect(state.turns[2].isTimeSelection).toBeUndefined()
  })
})
