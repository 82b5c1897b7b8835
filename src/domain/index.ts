/**
 * Domain Layer - Pure Business Logic
 *
 * This layer contains all business logic with no side effects.
 * Functions here are pure, easily testable, and have no dependencies
 * on infrastructure (network, storage).
 */

export * from './types'
export * from './wallet'
export * from './transaction'
