export * from './delay.util';
