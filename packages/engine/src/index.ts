export * from './outcomeIndex';
export * from './coverage';
export * from './traceability';
