export * from './distributionRandomSource';
export * from './randomSource';
export * from './seededRandomSource';
