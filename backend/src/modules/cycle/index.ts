/**
 * CYCLE MODULE — Index
 */

export * from './cycle.types.js';
export * from './cycle.constants.js';
export * from './cycle.dates.js';
export * from './cycle.calculator.js';
export * from './cycle.service.js';
export * from './cycle.schemas.js';

export { registerCycleRoutes, type CycleRoutesOptions } from './cycle.routes.js';
