import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RecordStoreService } from '../store/record-store.service';
import { InvalidRecord } from '../common/errors';
import { recordsConfig } from '../config/records.config';

/**
 * Holds the active academic session. Every session-scoped query reads
 * `current`; switching only changes which rows later queries surface.
 */
@Injectable()
export class SessionStateService implements OnModuleInit {
  private readonly logger = new Logger(SessionStateService.name);
  private readonly defaultSession: string;
  private active: string;

  constructor(
    private readonly store: RecordStoreService,
    private readonly configService: ConfigService,
  ) {
    this.defaultSession = this.configService.get<string>('DEFAULT_SESSION') || recordsConfig.session.default;
    this.active = this.defaultSession;
  }

  get current(): string {
    return this.active;
  }

  async onModuleInit() {
    await this.load();
  }

  /**
   * Restores the last used session, falling back to the default.
   */
  async load(): Promise<string> {
    const stored = await this.store.getSetting('last_session');
    this.active = stored && stored.trim() ? stored : this.defaultSession;
    this.logger.log(`Active session: ${this.active}`);
    return this.active;
  }

  async switchTo(session: string): Promise<string> {
    const next = session.trim();
    if (!next) {
      throw new InvalidRecord('Session name is required');
    }

    await this.store.setSetting('last_session', next);
    this.active = next;
    this.logger.log(`Switched to session ${next}`);
    return next;
  }
}
