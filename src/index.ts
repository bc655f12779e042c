export * from './landmarks';
