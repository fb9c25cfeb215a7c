import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { IOFailure, MalformedDocument, describeError } from '../common/errors';
import { formatFileStamp } from '../common/date-format';
import { recordsConfig } from '../config/records.config';

export function snapshotFileName(date: Date): string {
  return `school_records_backup_${formatFileStamp(date)}.json`;
}

export function collectionFileName(collection: 'students' | 'staff', session: string): string {
  return `${collection}_backup_${session}.json`;
}

/**
 * Reads and writes backup documents as indented JSON files.
 */
@Injectable()
export class BackupFileService {
  private readonly logger = new Logger(BackupFileService.name);

  constructor(private readonly configService: ConfigService) {}

  /** Default folder for new backups, from `BACKUP_DIR`. */
  get directory(): string {
    return this.configService.get<string>('BACKUP_DIR') || recordsConfig.backup.directory;
  }

  /**
   * Writes `data` under `fileName` in `directory` (or the default folder)
   * and returns the full path.
   */
  async write(fileName: string, data: unknown, directory: string = this.directory): Promise<string> {
    const target = path.join(directory, fileName);
    try {
      await fs.promises.mkdir(directory, { recursive: true });
      await fs.promises.writeFile(target, JSON.stringify(data, null, recordsConfig.backup.indent), 'utf8');
    } catch (error) {
      throw new IOFailure(`write ${target}`, error);
    }

    this.logger.log(`Backup written to ${target}`);
    return target;
  }

  /**
   * Parsed JSON content of `file`. The shape is checked by the reconciler.
   */
  async read(file: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.promises.readFile(file, 'utf8');
    } catch (error) {
      throw new IOFailure(`read ${file}`, error);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new MalformedDocument(`${file} is not valid JSON: ${describeError(error)}`, { cause: error });
    }
  }
}
