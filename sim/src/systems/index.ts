// ============================================
// Simulation Systems - Index
// ============================================

// Types
export type { System, SystemContext } from './types';
export { SystemPriority } from './types';

// Runner
export { SystemRunner } from './SystemRunner';

// Step systems
export { MovementSystem, enforceBounds } from './MovementSystem';
export { ContactSystem, checkContacts } from './ContactSystem';
export type { InfectionListener } from './ContactSystem';
