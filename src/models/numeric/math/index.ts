export * from './linear-algebra';
