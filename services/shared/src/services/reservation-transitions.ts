import { isReservationStatus, ReservationStatus } from '../types/commerce.types';

/**
 * What a status change does to the stock ledger.
 * - restore: reserved quantities go back to inventory
 * - consume: reserved quantities stay decremented for good
 * - none: status/metadata overwrite only
 */
export type StockEffect = 'restore' | 'consume' | 'none';

const TRANSITIONS: Record<ReservationStatus, Partial<Record<ReservationStatus, StockEffect>>> = {
     reserved: { reserved: 'none', released: 'restore', committed: 'consume' },
     released: { released: 'none' },
     committed: { committed: 'none' },
};

/**
 * Returns the stock effect of moving a reservation from `from` to `to`, or
 * undefined when the transition is not allowed. A stored status outside the
 * known set has no outgoing transitions.
 */
export function stockEffectOf(from: string, to: ReservationStatus): StockEffect | undefined {
     if (!isReservationStatus(from)) {
          return undefined;
     }
     return TRANSITIONS[from][to];
}
