import optionParser from './src';
import OptionRegistry from './src/registry';
import compilePatterns, { tokenizeArgvElement } from './src/patterns';

export * from './src/types';
export * from './src/errors';
export * from './src/options';
export * from './src/query';
export * from './src/settings';
export { MAX_COUNT_LIMIT, MIN_COUNT_LIMIT, SOLITARY_HYPHEN, END_OF_OPTIONS_MARKER } from './src/constants';

export { OptionRegistry, compilePatterns, tokenizeArgvElement };
export default optionParser;
