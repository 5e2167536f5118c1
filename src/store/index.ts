export * from './mutex';
export * from './document-store';
