const INTEGER_PATTERN = /^[+-]?\d+$/;

const TRUE_TOKENS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_TOKENS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export const parseInteger = (value: string): number | null => {
  if (!INTEGER_PATTERN.test(value)) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

export const parseBoolean = (value: string): boolean | null => {
  if (TRUE_TOKENS.has(value)) {
    return true;
  }

  if (FALSE_TOKENS.has(value)) {
    return false;
  }

  return null;
};
