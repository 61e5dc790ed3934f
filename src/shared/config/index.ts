export * from './constants';
export * from './environment';
