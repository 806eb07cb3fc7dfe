export * from './conversation.types';
export * from './identity.types';
export * from './export.types';
