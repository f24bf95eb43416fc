import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createConversationState } from '@/lib/conversation-state'
import { hasPendingAction, queueConfirmation, queueTimeSelection, takePendingAction } from '@/lib/pending-actions'

describe('pending actions', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  it('records a click without touching the log', () => {
    const state = createConversationState('test-session')

    queueTimeSelection(state, '3:00 PM')

    expect(state.pendingTimeSelection).toBe('3:00 PM')
    expect(state.turns).toEqual([])
    expect(hasPendingAction(state)).toBe(true)
  })

  it('hands out each action once', () => {
    const state = createConversationState('test-session')
    queueConfirmation(state, 'yes')

    expect(takePendingAction(state)).toEqual({ kind: 'confirmation', value: 'yes' })
    expect(takePendingAction(state)).toBeNull()
  })

  it('gives time selection priority over confirmation', () => {
    const state = createConversationState('test-session')
    queueConfirmation(state, 'no, cancel')
    queueTimeSelection(state, '10 AM')

    expect(takePendingAction(state)).toEqual({ kind: 'time-selection', value: '10 AM' })
    expect(state.pendingConfirmation).toBe('no, cancel')
    expect(takePendingAction(state)).toEqual({ kind: 'confirmation', value: 'no, cancel' })
    expect(hasPendingAction(state)).toBe(false)
  })

  it('keeps only the latest click per slot', () => {
    const state = createConversationState('test-session')
    queueTimeSelection(state, '10 AM')
    queueTimeSelection(state, '11 AM')

    expect(takePendingAction(state)).toEqual({ kind: 'time-selection', value: '11 AM' })
    expect(takePendingAction(state)).toBeNull()
  })
})
