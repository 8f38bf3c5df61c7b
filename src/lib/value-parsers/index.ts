export * from './src/integer';
export * from './src/decimal';
export * from './src/boolean';
export * from './src/date';
export * from './src/enum';
export * from './src/file';
