import { Module } from '@nestjs/common';

import { CredentialsModule } from '../credentials/credentials.module';
import { TokensModule } from '../tokens/tokens.module';
import { AuthController } from './auth.controller';

@Module({
  imports: [CredentialsModule, TokensModule],
  controllers: [AuthController],
})
export class AuthModule {}
