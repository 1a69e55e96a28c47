export * from './token-source';
