/**
 * Domain Events Module
 *
 * Exports the notification slot, its subscriber-facing view and the
 * standard event argument types.
 *
 * @module domain/events
 */

// ============================================================================
// Event Arguments
// ============================================================================

export type { EventHandler } from './EventArgs';
export { EventArgs } from './EventArgs';

// ============================================================================
// Event Slot
// ============================================================================

export type { EventListener, IEvent, UnsubscribeFunction } from './EventSlot';
export { EventSlot } from './EventSlot';
