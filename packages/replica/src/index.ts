export * from './type-map';
export * from './typed-table';
export * from './materialize';
export * from './statement';
export * from './engine';
export * from './credentials';
export * from './database';
export * from './registry';
