export {
  ANALYZER_VERSION,
  BALANCE_TOLERANCE,
  MIN_SELECTABLE_WORDS,
  PAGE_BREAK,
  ACCOUNT_NUMBER_VISIBLE_DIGITS,
  TEXT_SOURCES,
  type TextSource,
} from './constants.js';
export { toCalendarDay } from './date.js';
export { parseAmount, toMoney, roundToTwoDecimals } from './money.js';
export { maskAccountNumber } from './account.js';
