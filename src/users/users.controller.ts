import { Controller, Get, Logger, NotFoundException, Req } from '@nestjs/common';

import { requireIdentity, RequestWithIdentity } from '../access/request-identity';
import { CredentialsService } from '../credentials/credentials.service';
import { PublicUser, UserRecord } from '../credentials/types';
import { toHttpException } from '../utils/to-http-exception';

@Controller('users')
export class UsersController {
  private readonly logger = new Logger(UsersController.name);

  constructor(private readonly credentialsService: CredentialsService) {}

  @Get('me')
  async me(@Req() request: RequestWithIdentity): Promise<PublicUser> {
    const identity = requireIdentity(request);

    let record: UserRecord | null;
    try {
      record = await this.credentialsService.findUser(identity.userId);
    } catch (error) {
      throw toHttpException(error, this.logger);
    }

    if (!record) {
      throw new NotFoundException('User not found');
    }
    return this.credentialsService.toPublicUser(record);
  }
}
