export * from './args';
export * from './cli.utils';
export * from './file-processor';
export * from './interactive';
export * from './main';
export * from './output';
