export interface FeeComponents {
  tuition: number;
  lab: number;
  sport: number;
  computer: number;
  maintenance: number;
  exam: number;
  late: number;
}

export type AttendanceStatus = 'Good' | 'Average' | 'Poor';

export const GOOD_ATTENDANCE_THRESHOLD = 75;
export const AVERAGE_ATTENDANCE_THRESHOLD = 50;

/**
 * Sum of the seven fee components. Components are expected to be
 * non-negative; that is checked where they are entered, not here.
 */
export function totalFee(components: FeeComponents): number {
  return (
    components.tuition +
    components.lab +
    components.sport +
    components.computer +
    components.maintenance +
    components.exam +
    components.late
  );
}

/**
 * `daysPresent / workingDays * 100`, or 0 when there were no working days.
 * Not clamped: more days present than working days gives more than 100.
 */
export function attendancePercentage(daysPresent: number, workingDays: number): number {
  return workingDays > 0 ? (daysPresent / workingDays) * 100 : 0;
}

export function attendanceStatus(percent: number): AttendanceStatus {
  if (percent >= GOOD_ATTENDANCE_THRESHOLD) {
    return 'Good';
  }
  if (percent >= AVERAGE_ATTENDANCE_THRESHOLD) {
    return 'Average';
  }
  return 'Poor';
}

export function classAverage(percentages: readonly number[]): number {
  if (percentages.length === 0) {
    return 0;
  }
  return percentages.reduce((sum, percent) => sum + percent, 0) / percentages.length;
}

export function formatPercentage(percent: number): string {
  return percent.toFixed(2);
}

export function joinMonths(months: readonly string[]): string {
  return months
    .map((month) => month.trim())
    .filter((month) => month.length > 0)
    .join(', ');
}

export function splitMonths(months: string): string[] {
  return months
    .split(',')
    .map((month) => month.trim())
    .filter((month) => month.length > 0);
}
