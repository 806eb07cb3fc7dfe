export * from './conversation-document.parser';
export * from './identity.parser';
