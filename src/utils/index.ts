export * from './misc';
export * from './exec';
export * from './download';
