export * from './module-config';
