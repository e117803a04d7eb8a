import type { Logger } from 'pino';
import { ulid } from 'ulid';
import type {
  CashFlowRun,
  CashFlowSeries,
  Compounding,
  DurationResult,
  ISODate,
  LoanRecord,
  MonthlyCashFlowRow,
  PrincipalField
} from '../../shared/cashflow-types';
import type { AppConfig } from '../bootstrap/config';
import { withRunId } from '../bootstrap/logger';
import { parseAssumptions, parseLoans, type AssumptionSetInput } from '../domain/assumptions';
import { projectPortfolio } from '../domain/amortization';
import { aggregateMonthlyTotals } from '../domain/aggregation';
import { solveYieldDetailed } from '../domain/yield-solver';
import { computeDuration, computeWal } from '../domain/risk-metrics';
import { toEngineError } from '../utils/error-handler';

export interface CashFlowRequestOptions {
  includeMonthlyTotals?: boolean;
  groupBy?: readonly string[];
}

export type SolverSettings = Pick<AppConfig, 'yieldMaxIterations' | 'yieldTolerance' | 'yieldCompounding'>;

/**
 * Entry point for hosting applications: validates input eagerly, runs the
 * pure domain functions and logs one start and one finish line per call.
 */
export class CashFlowService {
  private log: Logger;

  constructor(private settings: SolverSettings, logger: Logger) {
    this.log = logger.child({ component: 'cashflow-service' });
  }

  computeCashFlows(
    loans: readonly LoanRecord[],
    assumptions: AssumptionSetInput,
    options: CashFlowRequestOptions = {}
  ): CashFlowRun {
    return this.run('compute_cash_flows', { loans: loans.length }, runId => {
      const validLoans = parseLoans(loans);
      const validAssumptions = parseAssumptions(assumptions);

      const loanCashFlows = projectPortfolio(validLoans, validAssumptions);
      const result: CashFlowRun = { runId, loanCashFlows };
      if (options.includeMonthlyTotals) {
        result.monthlyTotals = aggregateMonthlyTotals(loanCashFlows, {
          groupBy: options.groupBy,
          loans: validLoans
        });
      }

      this.log.info(
        { rows: loanCashFlows.length, months: result.monthlyTotals?.length },
        'Cash flows projected'
      );
      return result;
    });
  }

  solveYield(
    series: CashFlowSeries,
    pv: number,
    startDate: ISODate,
    compounding: Compounding = this.settings.yieldCompounding,
    maxIterations: number = this.settings.yieldMaxIterations,
    tolerance: number = this.settings.yieldTolerance
  ): number {
    return this.run('solve_yield', { flows: series.length, compounding }, () => {
      const solution = solveYieldDetailed(series, pv, startDate, { compounding, maxIterations, tolerance });
      this.log.info(solution, 'Yield solved');
      return solution.rate;
    });
  }

  computeDuration(
    loanCashFlows: readonly MonthlyCashFlowRow[],
    discountRate?: number,
    includeConvexity = false
  ): DurationResult {
    return this.run('compute_duration', { rows: loanCashFlows.length, discountRate }, () => {
      const result = computeDuration(loanCashFlows, { discountRate, includeConvexity });
      this.log.info(result, 'Duration computed');
      return result;
    });
  }

  computeWal(
    loanCashFlows: readonly MonthlyCashFlowRow[],
    principalField: PrincipalField = 'total'
  ): number {
    return this.run('compute_wal', { rows: loanCashFlows.length, principalField }, () => {
      const wal = computeWal(loanCashFlows, principalField);
      this.log.info({ wal }, 'WAL computed');
      return wal;
    });
  }

  private run<T>(operation: string, context: Record<string, unknown>, fn: (runId: string) => T): T {
    const runId = ulid();
    return withRunId(runId, () => {
      this.log.debug({ operation, ...context }, 'Operation started');
      try {
        return fn(runId);
      } catch (error) {
        const engineError = toEngineError(error);
        this.log.warn(
          { operation, code: engineError.code, details: engineError.details },
          engineError.message
        );
        throw engineError;
      }
    });
  }
}
