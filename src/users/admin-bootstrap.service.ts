import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CredentialsService } from '../credentials/credentials.service';
import { DuplicateEmailError } from '../credentials/errors';
import { Privilege } from '../credentials/types';

const MIN_PASSWORD_LENGTH = 8;

/**
 * Seeds an Admin account from BOOTSTRAP_ADMIN_EMAIL / BOOTSTRAP_ADMIN_PASSWORD
 * when no user with that email exists yet.
 */
@Injectable()
export class AdminBootstrapService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AdminBootstrapService.name);

  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const email = (this.configService.get<string>('BOOTSTRAP_ADMIN_EMAIL') ?? '').trim();
    const password = this.configService.get<string>('BOOTSTRAP_ADMIN_PASSWORD') ?? '';
    if (email.length === 0 && password.length === 0) {
      return;
    }

    if (email.length === 0 || password.length < MIN_PASSWORD_LENGTH) {
      this.logger.warn(
        `Admin bootstrap skipped: BOOTSTRAP_ADMIN_EMAIL and a BOOTSTRAP_ADMIN_PASSWORD of at least ${MIN_PASSWORD_LENGTH} characters are required`,
      );
      return;
    }

    try {
      const existing = await this.credentialsService.findUserByEmail(email);
      if (existing) {
        this.logger.log(`Admin bootstrap skipped: user ${existing.id} already exists`);
        return;
      }

      const created = await this.credentialsService.createUser(email, password, Privilege.Admin);
      this.logger.log(`Bootstrapped admin user ${created.id}`);
    } catch (error) {
      if (error instanceof DuplicateEmailError) {
        this.logger.log('Admin bootstrap skipped: email was registered concurrently');
        return;
      }

      // The service still starts; credential routes answer 503 until the store is back.
      this.logger.warn(`Admin bootstrap failed: ${error instanceof Error ? error.message : 'unknown error'}`);
    }
  }
}
