import { Injectable, Logger } from '@nestjs/common';
import { Like } from 'typeorm';
import { RecordStoreService } from '../store/record-store.service';
import { IdentifierScheme, recordsConfig } from '../config/records.config';

export function formatIdentifier(scheme: IdentifierScheme, sequence: number): string {
  return `${scheme.prefix}${String(sequence).padStart(scheme.width, '0')}`;
}

/**
 * Numeric suffix of `identifier`, or null when it does not follow the scheme.
 */
export function parseSequence(identifier: string, scheme: IdentifierScheme): number | null {
  if (!identifier.startsWith(scheme.prefix)) {
    return null;
  }
  const suffix = identifier.slice(scheme.prefix.length);
  return /^\d+$/.test(suffix) ? Number(suffix) : null;
}

/**
 * Allocates student numbers, staff ids and receipt numbers. Allocation
 * looks at every session, never just the active one.
 */
@Injectable()
export class IdentifierAllocatorService {
  private readonly logger = new Logger(IdentifierAllocatorService.name);

  constructor(private readonly store: RecordStoreService) {}

  /**
   * Row count + 1. A deleted row can make this collide with a surviving,
   * higher number; the insert then fails with UniqueConstraintViolation.
   */
  async nextStudentNumber(): Promise<string> {
    const count = await this.store.students.count();
    return formatIdentifier(recordsConfig.identifiers.student, count + 1);
  }

  async nextStaffId(): Promise<string> {
    const count = await this.store.staff.count();
    return formatIdentifier(recordsConfig.identifiers.staff, count + 1);
  }

  /**
   * Highest existing receipt + 1. Receipts with a non-numeric suffix are
   * ignored.
   */
  async nextReceiptNumber(): Promise<string> {
    const scheme = recordsConfig.identifiers.receipt;
    const receipts = await this.store.feePayments.find({ receiptNumber: Like(`${scheme.prefix}%`) });

    let highest = 0;
    for (const { receiptNumber } of receipts) {
      const sequence = parseSequence(receiptNumber, scheme);
      if (sequence === null) {
        this.logger.debug(`Ignoring malformed receipt number ${receiptNumber}`);
      } else if (sequence > highest) {
        highest = sequence;
      }
    }

    return formatIdentifier(scheme, highest + 1);
  }
}
