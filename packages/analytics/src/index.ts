export {
  checkBalances,
  validateBalances,
  type BalanceCheck,
  type BalanceSummaryInput,
} from './balance-validator.js';
export { countDuplicates, duplicateKey, type DuplicateCandidate } from './duplicate-detector.js';
export {
  computeAverageDailyBalance,
  toDatedBalances,
  type BalancePoint,
  type DatedBalance,
} from './average-daily-balance.js';
