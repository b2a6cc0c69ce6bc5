export * from './types/frames';
export * from './types/ui-state';
export * from './types/wire';
