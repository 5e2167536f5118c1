/**
 * System Module
 *
 * Scheduling, delivery, eligibility, transport, configuration, error handling
 * and monitoring for the broadcast service.
 */

export * from './scheduler';
export * from './error-handling';
export * from './monitoring';
export * from './eligibility';
export * from './transport';
export * from './delivery';
export * from './config';
export * from './system';
