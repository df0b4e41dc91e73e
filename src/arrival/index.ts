export * from './arrivalGenerator';
export * from './arrivalSequence';
export * from './arrivalSource';
