export const SHORT_NAME_PATTERN = '[A-Za-z\\d@?]';
export const LONG_NAME_PATTERN = '[A-Za-z\\d][A-Za-z\\d-]*[A-Za-z\\d]';

export const MIN_COUNT_LIMIT = 0;
export const MAX_COUNT_LIMIT = 100;

export const END_OF_OPTIONS_MARKER = '--';
export const SOLITARY_HYPHEN = '-';

const SHORT_NAME_REGEX = new RegExp(`^${SHORT_NAME_PATTERN}$`);
const LONG_NAME_REGEX = new RegExp(`^${LONG_NAME_PATTERN}$`);

export const optionNamePredicate = {
  isShortName: (s: string) => SHORT_NAME_REGEX.test(s),
  isLongName: (s: string) => LONG_NAME_REGEX.test(s),
};
