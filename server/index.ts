import { loadConfig, type AppConfig } from './bootstrap/config';
import { loggerFromConfig } from './bootstrap/logger';
import { CashFlowService } from './services/cashflow-service';

export * from '../shared/cashflow-types';
export { loadConfig, type AppConfig } from './bootstrap/config';
export { getLogger, withRunId, currentRunId } from './bootstrap/logger';
export { CashFlowService, type CashFlowRequestOptions, type SolverSettings } from './services/cashflow-service';
export { EngineError, ErrorCode, isEngineError, toEngineError } from './utils/error-handler';
export {
  assumptionSetSchema,
  loanRecordSchema,
  parseAssumptions,
  parseLoans,
  resolveAssumption,
  type AssumptionSetInput
} from './domain/assumptions';
export { projectLoan, projectPortfolio, contractualPayment } from './domain/amortization';
export { aggregateMonthlyTotals, type AggregationOptions } from './domain/aggregation';
export {
  solveYield,
  solveYieldDetailed,
  seriesFromTotals,
  discountFactor,
  effectiveAnnualRate,
  type YieldSolverOptions,
  type YieldSolution
} from './domain/yield-solver';
export {
  computeDuration,
  computeDurationByLoan,
  computeWal,
  presentValueAt,
  estimatePriceChange,
  type DurationOptions,
  type PriceChangeEstimate
} from './domain/risk-metrics';
export { yearFraction, monthlySchedule, addMonthsIso } from './domain/day-count';
export { cprToSmm, levelPayment } from './domain/money';

/**
 * Service wired from environment configuration
 */
export function createCashFlowService(config: AppConfig = loadConfig()): CashFlowService {
  return new CashFlowService(config, loggerFromConfig(config));
}
