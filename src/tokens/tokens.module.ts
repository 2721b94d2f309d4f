import { Module } from '@nestjs/common';

import { CredentialsModule } from '../credentials/credentials.module';
import { StoreModule } from '../store/store.module';
import { TokensService } from './tokens.service';

@Module({
  imports: [StoreModule, CredentialsModule],
  providers: [TokensService],
  exports: [TokensService],
})
export class TokensModule {}
