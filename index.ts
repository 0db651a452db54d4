/**
 * Card engine entry point: the shared modules plus Tressette.
 */
export * from './src/card-system';
export * from './src/core-engine';
export * from './src/rule-engine';
export * from './example-games/tressette';
