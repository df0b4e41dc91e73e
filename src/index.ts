export * from './arrival';
export * from './cliArgs';
export * from './config';
export * from './errors';
export * from './policy';
export * from './random';
export * from './report';
export * from './run';
export * from './simulation';
export * from './simulationSet';
export * from './statistics';
export * from './ticket';
export * from './ticketFactory';
