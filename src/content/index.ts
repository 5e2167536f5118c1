export * from './types';
export * from './content-store';
export * from './content-catalog';
export * from './rotation-selector';
export * from './scheduled-messages';
export * from './event-content';
