import formatUsage from './src/format';

export * from './src/format';
export default formatUsage;
