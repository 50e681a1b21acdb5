import { IndexParseError } from '../utils/errors.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const SIGNED_DECIMAL = /^[+-]?\d+$/;

/**
 * Read the benchmark index out of a directory name such as
 * "12th fibonacci number". The text before the first delimiter must be a
 * signed 32-bit decimal integer, with no surrounding whitespace.
 */
export function parseIndexFromDirName(dirName: string, delimiter: string = 'th'): number {
  const cut = dirName.indexOf(delimiter);
  if (cut === -1) {
    throw new IndexParseError(`Directory name "${dirName}" does not contain "${delimiter}"`, {
      dirName,
      delimiter,
    });
  }

  const digits = dirName.slice(0, cut);
  if (!SIGNED_DECIMAL.test(digits)) {
    throw new IndexParseError(`Directory name "${dirName}" does not start with an integer index`, {
      dirName,
      prefix: digits,
    });
  }

  const index = Number(digits);
  if (index < INT32_MIN || index > INT32_MAX) {
    throw new IndexParseError(`Index ${digits} in "${dirName}" is out of range`, {
      dirName,
      prefix: digits,
    });
  }

  // Number('-0') is -0
  return index === 0 ? 0 : index;
}
