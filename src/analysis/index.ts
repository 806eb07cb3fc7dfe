export * from './field.resolver';
export * from './document.normaliser';
export * from './user.extractor';
export * from './conversation.counter';
export * from './conversation.filter';
export * from './display-name.formatter';
