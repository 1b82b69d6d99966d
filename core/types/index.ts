export * from './span';
export * from './decoration';
export * from './feedback';
export * from './layout';
export * from './node';
