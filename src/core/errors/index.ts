export * from './ErrorContext';
export * from './HearthError';
export * from './errors';
export * from './errorFactory';
