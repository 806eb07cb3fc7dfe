export * from './constants';
export * from './errors';
export * from './file.utils';
export * from './json.utils';
export * from './text.utils';
