import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Req,
} from '@nestjs/common';

import { requireIdentity, RequestWithIdentity } from '../access/request-identity';
import { CredentialsService } from '../credentials/credentials.service';
import { PrivilegeLevel, PublicUser } from '../credentials/types';
import { TokensService } from '../tokens/tokens.service';
import { toHttpException } from '../utils/to-http-exception';

type PrivilegeBody = {
  privilege?: unknown;
};

type AuditAction = 'list' | 'change-privilege' | 'disable';

@Controller('admin/users')
export class UsersAdminController {
  private readonly logger = new Logger(UsersAdminController.name);

  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly tokensService: TokensService,
  ) {}

  @Get()
  async list(@Req() request: RequestWithIdentity): Promise<{ items: PublicUser[] }> {
    try {
      const users = await this.credentialsService.listUsers();
      this.audit(request, 'list', 'ok', { count: users.length });
      return { items: users.map((user) => this.credentialsService.toPublicUser(user)) };
    } catch (error) {
      this.audit(request, 'list', 'error', { reason: this.errorReason(error) });
      throw toHttpException(error, this.logger);
    }
  }

  /**
   * Outstanding refresh tokens are revoked so the new level applies from the
   * next login. Access tokens already issued keep their level until expiry.
   */
  @Post(':userId/privilege')
  @HttpCode(HttpStatus.OK)
  async changePrivilege(
    @Req() request: RequestWithIdentity,
    @Param('userId') userId: string,
    @Body() body: PrivilegeBody,
  ): Promise<{ user: PublicUser; revokedRefreshTokens: number }> {
    const parsedUserId = this.parseUserId(userId);
    const privilege = this.parsePrivilege(body);

    try {
      const updated = await this.credentialsService.updatePrivilege(parsedUserId, privilege);
      const revokedRefreshTokens = await this.tokensService.revokeAllForUser(parsedUserId);
      this.audit(request, 'change-privilege', 'ok', { userId: parsedUserId, privilege });
      return { user: this.credentialsService.toPublicUser(updated), revokedRefreshTokens };
    } catch (error) {
      this.audit(request, 'change-privilege', 'error', {
        userId: parsedUserId,
        reason: this.errorReason(error),
      });
      throw toHttpException(error, this.logger);
    }
  }

  @Post(':userId/disable')
  @HttpCode(HttpStatus.OK)
  async disable(
    @Req() request: RequestWithIdentity,
    @Param('userId') userId: string,
  ): Promise<{ user: PublicUser; revokedRefreshTokens: number }> {
    const parsedUserId = this.parseUserId(userId);
    if (parsedUserId === requireIdentity(request).userId) {
      throw new BadRequestException('Administrators cannot disable their own account');
    }

    try {
      const updated = await this.credentialsService.disableUser(parsedUserId);
      const revokedRefreshTokens = await this.tokensService.revokeAllForUser(parsedUserId);
      this.audit(request, 'disable', 'ok', { userId: parsedUserId });
      return { user: this.credentialsService.toPublicUser(updated), revokedRefreshTokens };
    } catch (error) {
      this.audit(request, 'disable', 'error', {
        userId: parsedUserId,
        reason: this.errorReason(error),
      });
      throw toHttpException(error, this.logger);
    }
  }

  private parseUserId(value: string): string {
    const normalized = value?.trim();
    if (!normalized) {
      throw new BadRequestException('userId is required');
    }

    return normalized;
  }

  private parsePrivilege(body: PrivilegeBody | undefined): PrivilegeLevel {
    const privilege = body?.privilege;
    if (typeof privilege !== 'number' || !Number.isInteger(privilege) || privilege < 0) {
      throw new BadRequestException('privilege must be a non-negative integer');
    }

    return privilege;
  }

  private audit(
    request: RequestWithIdentity,
    action: AuditAction,
    result: 'ok' | 'error',
    details?: Record<string, unknown>,
  ): void {
    const requestIdHeader = request.headers['x-request-id'];
    const requestId = Array.isArray(requestIdHeader) ? requestIdHeader[0] : requestIdHeader;
    const payload = {
      event: 'admin_user_audit',
      action,
      result,
      adminIdentity: request.identity ? `user:${request.identity.userId}` : 'unknown',
      ip: request.ip ?? 'unknown',
      requestId: requestId ?? null,
      ...details,
    };

    if (result === 'error') {
      this.logger.warn(JSON.stringify(payload));
      return;
    }

    this.logger.log(JSON.stringify(payload));
  }

  private errorReason(error: unknown): string {
    if (error instanceof Error) {
      return error.name;
    }
    return 'UnknownError';
  }
}
