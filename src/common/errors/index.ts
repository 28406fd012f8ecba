export * from './gateway-error';
export * from './error-classifier';
