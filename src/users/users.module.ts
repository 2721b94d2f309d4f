import { Module } from '@nestjs/common';

import { CredentialsModule } from '../credentials/credentials.module';
import { TokensModule } from '../tokens/tokens.module';
import { AdminBootstrapService } from './admin-bootstrap.service';
import { UsersController } from './users.controller';
import { UsersAdminController } from './users-admin.controller';

@Module({
  imports: [CredentialsModule, TokensModule],
  controllers: [UsersController, UsersAdminController],
  providers: [AdminBootstrapService],
})
export class UsersModule {}
