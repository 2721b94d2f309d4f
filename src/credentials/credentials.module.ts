import { Module } from '@nestjs/common';

import { StoreModule } from '../store/store.module';
import { CredentialsService } from './credentials.service';

@Module({
  imports: [StoreModule],
  providers: [CredentialsService],
  exports: [CredentialsService],
})
export class CredentialsModule {}
