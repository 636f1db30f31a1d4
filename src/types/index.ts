export * from './query';
export * from './bill';
export * from './reasoning';
