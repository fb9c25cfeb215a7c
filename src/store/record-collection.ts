import { Logger } from '@nestjs/common';
import { DeepPartial, FindOptionsOrder, FindOptionsWhere, QueryFailedError, Repository } from 'typeorm';
import { IOFailure, RecordsError, UniqueConstraintViolation } from '../common/errors';

export interface StoredRow {
  id: number;
}

export interface NaturalKey<T> {
  /** Business field name, as it appears in snapshots. */
  field: string;
  valueOf: (row: T) => string;
  where: (row: T) => FindOptionsWhere<T>;
}

export type KeyLookup<T> = (row: T) => FindOptionsWhere<T>;

const UNIQUE_FAILURE = /UNIQUE constraint failed: \w+\.(\w+)/;

/**
 * Typed access to one table of the record store. Rows are replaced whole:
 * `upsert` keeps the surrogate id of the row it replaces and overwrites
 * every business field.
 */
export class RecordCollection<T extends StoredRow> {
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    private readonly repository: Repository<T>,
    private readonly naturalKey?: NaturalKey<T>,
  ) {
    this.logger = new Logger(`RecordCollection:${name}`);
  }

  /**
   * Rows matching `where`, in insertion order unless `order` is given.
   */
  async find(where?: FindOptionsWhere<T> | FindOptionsWhere<T>[], order?: FindOptionsOrder<T>): Promise<T[]> {
    const rows = await this.run('find', () => this.repository.find({ where, order }));
    return order ? rows : rows.sort((a, b) => a.id - b.id);
  }

  async findOne(where: FindOptionsWhere<T> | FindOptionsWhere<T>[]): Promise<T | null> {
    return this.run('findOne', () => this.repository.findOneBy(where));
  }

  async count(where?: FindOptionsWhere<T> | FindOptionsWhere<T>[]): Promise<number> {
    return this.run('count', () => this.repository.count({ where }));
  }

  /**
   * Inserts a new row, refusing a natural key that is already stored.
   */
  async insert(fields: DeepPartial<T>): Promise<T> {
    const entity = this.repository.create(fields);
    const key = this.naturalKey;

    if (key) {
      const clash = await this.run('insert', () => this.repository.findOneBy(key.where(entity)));
      if (clash) {
        throw new UniqueConstraintViolation(this.name, key.field, key.valueOf(entity));
      }
    }

    return this.persist('insert', entity);
  }

  /**
   * Replaces the row matching `lookup` in place, or inserts when none does.
   * Without a lookup the collection's natural key is used.
   */
  async upsert(fields: DeepPartial<T>, lookup?: KeyLookup<T>): Promise<T> {
    const where = lookup ?? this.naturalKey?.where;
    if (!where) {
      throw new Error(`Collection ${this.name} has no natural key to upsert by`);
    }

    const entity = this.repository.create(fields);
    const existing = await this.run('upsert', () => this.repository.findOneBy(where(entity)));
    if (existing) {
      entity.id = existing.id;
    }

    return this.persist('upsert', entity);
  }

  /**
   * Ledger insert: no key check, every call adds a row.
   */
  async append(fields: DeepPartial<T>): Promise<T> {
    return this.persist('append', this.repository.create(fields));
  }

  /**
   * Removes one row by surrogate id; false when no such row exists.
   */
  async delete(id: number): Promise<boolean> {
    const result = await this.run('delete', () => this.repository.delete(id));
    const deleted = (result.affected ?? 0) > 0;
    this.logger.debug(deleted ? `Deleted row ${id}` : `No row ${id} to delete`);
    return deleted;
  }

  async clear(): Promise<void> {
    await this.run('clear', () => this.repository.clear());
    this.logger.log(`Cleared ${this.name}`);
  }

  private async persist(operation: string, entity: T): Promise<T> {
    try {
      return await this.repository.save(entity);
    } catch (error) {
      const unique = error instanceof QueryFailedError ? UNIQUE_FAILURE.exec(error.message) : null;
      if (unique) {
        const value = this.naturalKey ? this.naturalKey.valueOf(entity) : '';
        throw new UniqueConstraintViolation(this.name, unique[1], value);
      }
      throw new IOFailure(`${this.name}.${operation}`, error);
    }
  }

  private async run<R>(operation: string, work: () => Promise<R>): Promise<R> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof RecordsError) {
        throw error;
      }
      throw new IOFailure(`${this.name}.${operation}`, error);
    }
  }
}
