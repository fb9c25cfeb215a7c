import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { RecordStoreService, SettingKey } from '../store/record-store.service';
import { recordsConfig } from '../config/records.config';

export interface SchoolInfo {
  name: string;
  address: string;
  email: string;
}

export interface LoginCredentials {
  username: string;
  password: string;
}

const DEFAULT_SETTINGS: Array<[SettingKey, string]> = [
  ['school_name', recordsConfig.school.defaultName],
  ['school_address', ''],
  ['school_email', ''],
  ['remember_me', 'false'],
  ['saved_username', ''],
  ['saved_password', ''],
];

@Injectable()
export class SettingsService implements OnModuleInit {
  private readonly logger = new Logger(SettingsService.name);

  constructor(private readonly store: RecordStoreService) {}

  async onModuleInit() {
    let seeded = 0;
    for (const [key, value] of DEFAULT_SETTINGS) {
      if (await this.store.seedSetting(key, value)) {
        seeded++;
      }
    }
    if (seeded > 0) {
      this.logger.log(`Seeded ${seeded} default settings`);
    }
  }

  async schoolInfo(): Promise<SchoolInfo> {
    const [name, address, email] = await Promise.all([
      this.store.getSetting('school_name'),
      this.store.getSetting('school_address'),
      this.store.getSetting('school_email'),
    ]);

    return {
      name: name ?? recordsConfig.school.defaultName,
      address: address ?? '',
      email: email ?? '',
    };
  }

  async updateSchoolInfo(info: SchoolInfo): Promise<void> {
    await this.store.setSetting('school_name', info.name);
    await this.store.setSetting('school_address', info.address);
    await this.store.setSetting('school_email', info.email);
  }

  /**
   * Credentials saved by the login screen's "remember me", if enabled.
   */
  async rememberedLogin(): Promise<LoginCredentials | null> {
    if ((await this.store.getSetting('remember_me')) !== 'true') {
      return null;
    }

    return {
      username: (await this.store.getSetting('saved_username')) ?? '',
      password: (await this.store.getSetting('saved_password')) ?? '',
    };
  }

  async rememberLogin(credentials: LoginCredentials | null): Promise<void> {
    await this.store.setSetting('remember_me', credentials ? 'true' : 'false');
    await this.store.setSetting('saved_username', credentials?.username ?? '');
    await this.store.setSetting('saved_password', credentials?.password ?? '');
  }
}
