import { describe, expect, it, vi } from 'vitest'
import {
  appendAssistantTurn,
  appendUserTurn,
  createConversationState,
  getConversationStats,
  resetConversation,
} from '@/lib/conversation-state'
import { markCelebrated } from '@/lib/display-selector'
import { hasPendingAction, queueConfirmation, queueTimeSelection, takePendingAction } from '@/lib/pending-actions'

describe('conversation state', () => {
  it('starts empty with sentinel indices', () => {
    const state = createConversationState()

    expect(state.sessionId).toMatch(/^web_/)
    expect(state.turns).toEqual([])
    expect(state.lastBookingTurn).toBe(-1)
    expect(state.lastSuggestionTurn).toBe(-1)
    expect(state.shownBookings.size).toBe(0)
    expect(hasPendingAction(state)).toBe(false)
  })

  it('gives each client its own session id', () => {
    expect(createConversationState().sessionId).not.toBe(createConversationState().sessionId)
  })

  it('still creates a session id where randomUUID is unavailable', () => {
    vi.stubGlobal('crypto', {})
    try {
      const first = createConversationState().sessionId
      expect(first).toMatch(/^web_[a-z0-9]+$/)
      expect(createConversationState().sessionId).not.toBe(first)
    } finally {
      vi.unstubAllGlobals()
    }
  })

  it('resets the log, indices, shown bookings and pending slots together', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const state = createConversationState('test-session')
    appendUserTurn(state, 'book')
    appendAssistantTurn(state, {
      message: 'Booked!',
      bookingData: { id: 'evt1' },
      suggestedTimes: ['10 AM'],
      requiresConfirmation: false,
    })
    markCelebrated(state, 'evt1')
    queueTimeSelection(state, '10 AM')
    queueConfirmation(state, 'yes')

    resetConversation(state)

    expect({
      sessionId: state.sessionId,
      turns: state.turns,
      lastBookingTurn: state.lastBookingTurn,
      lastSuggestionTurn: state.lastSuggestionTurn,
      shownBookings: [...state.shownBookings],
      pendingTimeSelection: state.pendingTimeSelection,
      pendingConfirmation: state.pendingConfirmation,
    }).toEqual({
      sessionId: 'test-session',
      turns: [],
      lastBookingTurn: -1,
      lastSuggestionTurn: -1,
      shownBookings: [],
      pendingTimeSelection: null,
      pendingConfirmation: null,
    })
    expect(takePendingAction(state)).toBeNull()
  })

  it('counts turns by role', () => {
    const state = createConversationState('test-session')
    appendUserTurn(state, 'hi')
    appendAssistantTurn(state, { message: 'hello', bookingData: null, suggestedTimes: [], requiresConfirmation: false })
    appendUserTurn(state, 'book')

    expect(getConversationStats(state)).toEqual({ total: 3, user: 2, assistant: 1 })
  })

  it('stamps turns in India Standard Time', () => {
    const state = createConversationState('test-session')
    appendUserTurn(state, 'hi')

    expect(state.turns[0].timestamp).toMatch(/\+05:30$/)
  })
})
