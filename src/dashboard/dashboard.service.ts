import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Interval } from '@nestjs/schedule';
import { FeePayment, SalaryPayment, Staff, Student } from '../database/entities';
import { SessionStateService } from '../session/session-state.service';
import { IOFailure, describeError } from '../common/errors';
import { recordsConfig } from '../config/records.config';

export interface DashboardSummary {
  session: string;
  totalStudents: number;
  totalStaff: number;
  feesCollected: number;
  expenses: number;
  computedAt: Date;
}

interface SumRow {
  total: number | string | null;
}

function toAmount(row: SumRow | undefined): number {
  const value = Number(row?.total ?? 0);
  return Number.isFinite(value) ? value : 0;
}

@Injectable()
export class DashboardService {
  private readonly logger = new Logger(DashboardService.name);
  private latestSummary: DashboardSummary | null = null;

  constructor(
    @InjectRepository(Student)
    private studentRepository: Repository<Student>,
    @InjectRepository(Staff)
    private staffRepository: Repository<Staff>,
    @InjectRepository(FeePayment)
    private feeRepository: Repository<FeePayment>,
    @InjectRepository(SalaryPayment)
    private salaryRepository: Repository<SalaryPayment>,
    private readonly session: SessionStateService,
  ) {}

  /** Last summary computed by `refresh`, null before the first run. */
  get latest(): DashboardSummary | null {
    return this.latestSummary;
  }

  @Interval('dashboard-refresh', recordsConfig.dashboard.refreshIntervalMs)
  async refresh(): Promise<void> {
    try {
      this.latestSummary = await this.summary();
    } catch (error) {
      this.logger.error(`Dashboard refresh failed: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
    }
  }

  async summary(): Promise<DashboardSummary> {
    const session = this.session.current;
    try {
      return await this.aggregate(session);
    } catch (error) {
      throw new IOFailure('dashboard.summary', error);
    }
  }

  private async aggregate(session: string): Promise<DashboardSummary> {
    const [totalStudents, totalStaff, fees, salaries] = await Promise.all([
      this.studentRepository.count({ where: { session } }),
      this.staffRepository.count({ where: { session } }),
      this.feeRepository
        .createQueryBuilder('fee')
        .select('SUM(fee.totalAmount)', 'total')
        .where('fee.session = :session', { session })
        .getRawOne<SumRow>(),
      this.salaryRepository
        .createQueryBuilder('salary')
        .select('SUM(salary.amount)', 'total')
        .where('salary.session = :session', { session })
        .getRawOne<SumRow>(),
    ]);

    return {
      session,
      totalStudents,
      totalStaff,
      feesCollected: toAmount(fees),
      expenses: toAmount(salaries),
      computedAt: new Date(),
    };
  }
}
